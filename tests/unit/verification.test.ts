import { describe, it, expect } from 'vitest'
import { verifySubscription } from '../../src/webhook/verification.js'

const VERIFY_TOKEN = 'test-verify-token'

describe('verifySubscription', () => {
  it('should echo the challenge for a matching subscribe request', () => {
    const result = verifySubscription(
      { 'hub.mode': 'subscribe', 'hub.verify_token': VERIFY_TOKEN, 'hub.challenge': '1158201444' },
      VERIFY_TOKEN
    )

    expect(result).toEqual({ verified: true, challenge: '1158201444' })
  })

  it.each([
    ['wrong_mode', { 'hub.mode': 'unsubscribe', 'hub.verify_token': VERIFY_TOKEN, 'hub.challenge': 'c' }],
    ['wrong_mode', { 'hub.verify_token': VERIFY_TOKEN, 'hub.challenge': 'c' }],
    ['token_mismatch', { 'hub.mode': 'subscribe', 'hub.verify_token': 'other', 'hub.challenge': 'c' }],
    ['missing_challenge', { 'hub.mode': 'subscribe', 'hub.verify_token': VERIFY_TOKEN }],
    ['missing_challenge', { 'hub.mode': 'subscribe', 'hub.verify_token': VERIFY_TOKEN, 'hub.challenge': '' }],
    ['invalid_query', { 'hub.mode': ['subscribe', 'subscribe'] }],
    ['invalid_query', null]
  ])('should refuse with %s', (reason, query) => {
    expect(verifySubscription(query, VERIFY_TOKEN)).toEqual({ verified: false, reason })
  })
})

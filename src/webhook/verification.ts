import { z } from 'zod'

const verificationQuerySchema = z.object({
  'hub.mode': z.string().optional(),
  'hub.verify_token': z.string().optional(),
  'hub.challenge': z.string().optional()
})

export type VerificationResult =
  | { verified: true; challenge: string }
  | { verified: false; reason: 'invalid_query' | 'wrong_mode' | 'token_mismatch' | 'missing_challenge' }

export function verifySubscription(query: unknown, verifyToken: string): VerificationResult {
  const parsed = verificationQuerySchema.safeParse(query)
  if (!parsed.success) {
    return { verified: false, reason: 'invalid_query' }
  }

  const mode = parsed.data['hub.mode']
  const token = parsed.data['hub.verify_token']
  const challenge = parsed.data['hub.challenge']

  if (mode !== 'subscribe') {
    return { verified: false, reason: 'wrong_mode' }
  }
  if (token !== verifyToken) {
    return { verified: false, reason: 'token_mismatch' }
  }
  if (challenge === undefined || challenge === '') {
    return { verified: false, reason: 'missing_challenge' }
  }
  return { verified: true, challenge }
}

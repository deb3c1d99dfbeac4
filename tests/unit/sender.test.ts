import { describe, it, expect, vi } from 'vitest'
import { createMockSender, createWhatsAppSender } from '../../src/whatsapp/sender.js'
import { WhatsAppApiError } from '../../src/errors.js'
import { createMockLogger } from '../mocks/whatsapp.js'

const config = { token: 'test-token', phoneNumberId: '100200300', apiVersion: 'v19.0' }
const MESSAGES_URL = 'https://graph.facebook.com/v19.0/100200300/messages'

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
}

function createFetch(response: Response = jsonResponse({ messages: [{ id: 'wamid.OUT1' }] })) {
  return vi.fn<typeof fetch>().mockResolvedValue(response)
}

function sentBody(mockFetch: ReturnType<typeof createFetch>): unknown {
  const init = mockFetch.mock.calls[0]?.[1]
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined
}

describe('WhatsAppSender', () => {
  describe('sendText', () => {
    it('should post a text message to the phone number endpoint', async () => {
      const mockFetch = createFetch()
      const sender = createWhatsAppSender(config, createMockLogger(), mockFetch)

      const result = await sender.sendText('15550001111', 'Hello')

      expect(result).toEqual({ messageId: 'wamid.OUT1' })
      expect(mockFetch).toHaveBeenCalledWith(MESSAGES_URL, {
        method: 'POST',
        headers: {
          'Authorization': 'Bearer test-token',
          'Content-Type': 'application/json'
        },
        body: JSON.stringify({ messaging_product: 'whatsapp', to: '15550001111', type: 'text', text: { body: 'Hello' } })
      })
    })

    it('should log start and success events', async () => {
      const logger = createMockLogger()
      const sender = createWhatsAppSender(config, logger, createFetch())

      await sender.sendText('15550001111', 'Hello')

      expect(logger.info).toHaveBeenCalledWith({ event: 'whatsapp_send_start', to: '15550001111' })
      expect(logger.info).toHaveBeenCalledWith({ event: 'whatsapp_send_success', to: '15550001111', messageId: 'wamid.OUT1' })
    })

    it.each([
      ['empty', ''],
      ['too long', 'x'.repeat(4097)]
    ])('should refuse an %s body without calling the API', async (_label, body) => {
      const mockFetch = createFetch()
      const sender = createWhatsAppSender(config, createMockLogger(), mockFetch)

      await expect(sender.sendText('1', body)).rejects.toThrow('Message is empty or too long')
      expect(mockFetch).not.toHaveBeenCalled()
    })

    it('should accept a body at the length limit', async () => {
      const sender = createWhatsAppSender(config, createMockLogger(), createFetch())

      await expect(sender.sendText('1', 'x'.repeat(4096))).resolves.toEqual({ messageId: 'wamid.OUT1' })
    })
  })

  describe('sendList', () => {
    it('should post an interactive list with truncated titles', async () => {
      const mockFetch = createFetch()
      const sender = createWhatsAppSender(config, createMockLogger(), mockFetch)

      await sender.sendList({
        to: '15550001111',
        body: 'Are you a student or a landlord?',
        title: 'User Type',
        options: [
          { id: 'student', title: 'Student' },
          { id: 'long', title: 'A title that is far too long for a row' }
        ]
      })

      expect(sentBody(mockFetch)).toEqual({
        messaging_product: 'whatsapp',
        to: '15550001111',
        type: 'interactive',
        interactive: {
          type: 'list',
          header: { type: 'text', text: 'User Type' },
          body: { text: 'Are you a student or a landlord?' },
          action: {
            button: 'Options',
            sections: [{
              title: 'Choose one',
              rows: [
                { id: 'student', title: 'Student' },
                { id: 'long', title: 'A title that is far too ' }
              ]
            }]
          }
        }
      })
    })

    it('should refuse more than ten rows', async () => {
      const mockFetch = createFetch()
      const sender = createWhatsAppSender(config, createMockLogger(), mockFetch)
      const options = Array.from({ length: 11 }, (_, i) => ({ id: `o${i}`, title: `Option ${i}` }))

      await expect(sender.sendList({ to: '1', body: 'b', title: 't', options })).rejects.toThrow(WhatsAppApiError)
      expect(mockFetch).not.toHaveBeenCalled()
    })
  })

  describe('sendButtons', () => {
    it('should post reply buttons', async () => {
      const mockFetch = createFetch()
      const sender = createWhatsAppSender(config, createMockLogger(), mockFetch)

      await sender.sendButtons({
        to: '15550001111',
        body: 'Do you have a cat?',
        options: [{ id: 'yes', title: 'Yes' }, { id: 'no', title: 'No' }]
      })

      expect(sentBody(mockFetch)).toEqual({
        messaging_product: 'whatsapp',
        to: '15550001111',
        type: 'interactive',
        interactive: {
          type: 'button',
          body: { text: 'Do you have a cat?' },
          action: {
            buttons: [
              { type: 'reply', reply: { id: 'yes', title: 'Yes' } },
              { type: 'reply', reply: { id: 'no', title: 'No' } }
            ]
          }
        }
      })
    })

    it('should refuse more than three buttons', async () => {
      const sender = createWhatsAppSender(config, createMockLogger(), createFetch())
      const options = ['a', 'b', 'c', 'd'].map(id => ({ id, title: id }))

      await expect(sender.sendButtons({ to: '1', body: 'b', options })).rejects.toThrow('Buttons need between 1 and 3 options')
    })
  })

  describe('errors', () => {
    it('should throw WhatsAppApiError on a network error', async () => {
      const mockFetch = vi.fn<typeof fetch>().mockRejectedValue(new Error('Connection refused'))
      const logger = createMockLogger()
      const sender = createWhatsAppSender(config, logger, mockFetch)

      await expect(sender.sendText('1', 'Hello')).rejects.toThrow('Network error sending message')
      expect(logger.error).toHaveBeenCalledWith(expect.objectContaining({ event: 'whatsapp_network_error', to: '1' }))
    })

    it('should carry the status code of a rejected request', async () => {
      const sender = createWhatsAppSender(config, createMockLogger(), createFetch(jsonResponse({ error: 'bad' }, 400)))

      await expect(sender.sendText('1', 'Hello')).rejects.toMatchObject({
        name: 'WhatsAppApiError',
        message: 'WhatsApp API error: 400',
        statusCode: 400
      })
    })

    it('should log a hint when the token is rejected', async () => {
      const logger = createMockLogger()
      const sender = createWhatsAppSender(config, logger, createFetch(new Response('unauthorized', { status: 401 })))

      await expect(sender.sendText('1', 'Hello')).rejects.toThrow(WhatsAppApiError)
      expect(logger.error).toHaveBeenCalledWith({ event: 'whatsapp_api_error', to: '1', statusCode: 401, body: 'unauthorized' })
      expect(logger.error).toHaveBeenCalledWith({ event: 'whatsapp_auth_failed', hint: 'Check WHATSAPP_TOKEN and WHATSAPP_PHONE_ID' })
    })

    it('should reject a response without a message id', async () => {
      const sender = createWhatsAppSender(config, createMockLogger(), createFetch(jsonResponse({ messages: [] })))

      await expect(sender.sendText('1', 'Hello')).rejects.toThrow('Unexpected WhatsApp API response')
    })
  })
})

describe('MockSender', () => {
  it('should log instead of sending and number its messages', async () => {
    const logger = createMockLogger()
    const sender = createMockSender(logger)

    const first = await sender.sendText('1', 'Hello')
    const second = await sender.sendButtons({ to: '1', body: 'Cat?', options: [{ id: 'yes', title: 'Yes' }] })

    expect(first).toEqual({ messageId: 'mock-msg-1' })
    expect(second).toEqual({ messageId: 'mock-buttons-2' })
    expect(logger.info).toHaveBeenCalledWith({ event: 'mock_send', to: '1', body: 'Hello', messageId: 'mock-msg-1' })
  })
})

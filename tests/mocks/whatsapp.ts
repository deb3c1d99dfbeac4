import { vi } from 'vitest'
import type { Logger } from '../../src/logger.js'
import type { WhatsAppSender } from '../../src/whatsapp/sender.js'
import type { InboundEvent } from '../../src/conversation/types.js'

export const PARTY_ID = '15550001111'
export const OWNER_PHONE = '15559990000'

export function createMockSender() {
  return {
    sendText: vi.fn<WhatsAppSender['sendText']>().mockResolvedValue({ messageId: 'mock-msg-id' }),
    sendList: vi.fn<WhatsAppSender['sendList']>().mockResolvedValue({ messageId: 'mock-list-id' }),
    sendButtons: vi.fn<WhatsAppSender['sendButtons']>().mockResolvedValue({ messageId: 'mock-btn-id' })
  } satisfies WhatsAppSender
}

export function createMockLogger() {
  return {
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>()
  } satisfies Logger
}

let deliveryCounter = 0

export function nextDeliveryId(): string {
  deliveryCounter++
  return `wamid.TEST${deliveryCounter}`
}

export function textEvent(text: string, deliveryId = nextDeliveryId(), partyId = PARTY_ID): InboundEvent {
  return { partyId, deliveryId, kind: 'text', displayName: 'Tendai', text }
}

export function imageEvent(deliveryId = nextDeliveryId(), partyId = PARTY_ID): InboundEvent {
  return { partyId, deliveryId, kind: 'image', displayName: 'Tendai' }
}

export function selectionEvent(selectionId: string, deliveryId = nextDeliveryId(), partyId = PARTY_ID): InboundEvent {
  return { partyId, deliveryId, kind: 'interactive', displayName: 'Tendai', selectionId }
}

interface PayloadOptions {
  id?: string
  from?: string
  name?: string
}

function wrapMessage(message: Record<string, unknown>, options: PayloadOptions) {
  const from = options.from ?? PARTY_ID
  return {
    object: 'whatsapp_business_account',
    entry: [{
      id: 'WABA-1',
      changes: [{
        field: 'messages',
        value: {
          messaging_product: 'whatsapp',
          contacts: [{ wa_id: from, profile: { name: options.name ?? 'Tendai' } }],
          messages: [{
            from,
            id: options.id ?? 'wamid.ABC123',
            timestamp: '1700000000',
            ...message
          }]
        }
      }]
    }]
  }
}

export function createTextPayload(text: string, options: PayloadOptions = {}) {
  return wrapMessage({ type: 'text', text: { body: text } }, options)
}

export function createImagePayload(options: PayloadOptions = {}) {
  return wrapMessage({ type: 'image', image: { id: 'media-1', mime_type: 'image/jpeg' } }, options)
}

export function createListReplyPayload(id: string, options: PayloadOptions = {}) {
  return wrapMessage({ type: 'interactive', interactive: { type: 'list_reply', list_reply: { id, title: id } } }, options)
}

export function createButtonReplyPayload(id: string, options: PayloadOptions = {}) {
  return wrapMessage({ type: 'interactive', interactive: { type: 'button_reply', button_reply: { id, title: id } } }, options)
}

export function createTemplateButtonPayload(text: string, options: PayloadOptions = {}) {
  return wrapMessage({ type: 'button', button: { payload: text, text } }, options)
}

export function createStickerPayload(options: PayloadOptions = {}) {
  return wrapMessage({ type: 'sticker', sticker: { id: 'sticker-1' } }, options)
}

export function createStatusPayload() {
  return {
    object: 'whatsapp_business_account',
    entry: [{
      id: 'WABA-1',
      changes: [{
        field: 'messages',
        value: {
          messaging_product: 'whatsapp',
          statuses: [{ id: 'wamid.OUT1', status: 'delivered' }]
        }
      }]
    }]
  }
}

import { z } from 'zod'
import type { InboundEvent } from '../conversation/types.js'

const replySchema = z.object({
  id: z.string(),
  title: z.string().optional()
})

export const inboundMessageSchema = z.object({
  from: z.string(),
  id: z.string(),
  timestamp: z.string().optional(),
  type: z.string(),
  text: z.object({
    body: z.string()
  }).optional(),
  image: z.object({
    id: z.string(),
    mime_type: z.string().optional(),
    caption: z.string().optional()
  }).optional(),
  interactive: z.object({
    type: z.string(),
    list_reply: replySchema.optional(),
    button_reply: replySchema.optional()
  }).optional(),
  button: z.object({
    payload: z.string().optional(),
    text: z.string().optional()
  }).optional()
})

export const contactSchema = z.object({
  wa_id: z.string().optional(),
  profile: z.object({
    name: z.string().optional()
  }).optional()
})

export const webhookPayloadSchema = z.object({
  object: z.string().optional(),
  entry: z.array(z.object({
    id: z.string().optional(),
    changes: z.array(z.object({
      field: z.string().optional(),
      value: z.object({
        messaging_product: z.string().optional(),
        contacts: z.array(contactSchema).optional(),
        messages: z.array(inboundMessageSchema).optional(),
        statuses: z.array(z.unknown()).optional()
      })
    }))
  })).min(1)
})

export type WebhookPayload = z.infer<typeof webhookPayloadSchema>
export type InboundMessage = z.infer<typeof inboundMessageSchema>

function selectionOf(message: InboundMessage): string | undefined {
  if (message.type === 'interactive') {
    return message.interactive?.list_reply?.id ?? message.interactive?.button_reply?.id
  }
  if (message.type === 'button') {
    return message.button?.payload ?? message.button?.text
  }
  return undefined
}

/**
 * Only the first message of the first change is taken; the Cloud API sends
 * one message per delivery.
 */
export function extractInboundEvent(payload: WebhookPayload): InboundEvent | null {
  const value = payload.entry[0]?.changes[0]?.value
  const message = value?.messages?.[0]
  if (!value || !message) {
    return null
  }

  const displayName = value.contacts?.[0]?.profile?.name
  const selectionId = selectionOf(message)

  if (selectionId !== undefined) {
    return { partyId: message.from, deliveryId: message.id, kind: 'interactive', displayName, selectionId }
  }

  return {
    partyId: message.from,
    deliveryId: message.id,
    kind: message.type,
    displayName,
    text: message.type === 'text' ? message.text?.body : undefined
  }
}

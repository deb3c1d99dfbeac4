import { StoreUnavailableError, WebhookError } from '../errors.js'
import { createNoopLogger, type Logger } from '../logger.js'
import { getMessage, type Messages } from '../messages.js'
import type { ConversationEngine } from '../conversation/engine.js'
import type { PartyQueue } from '../conversation/party-queue.js'
import { formatListingSummary } from '../conversation/summary.js'
import type { EngineResult, InboundEvent, ListingSummary, Step } from '../conversation/types.js'
import { dispatchDirective } from '../whatsapp/dispatch.js'
import type { WhatsAppSender } from '../whatsapp/sender.js'
import { webhookPayloadSchema, extractInboundEvent, type WebhookPayload } from './types.js'

export interface WebhookHandlerDeps {
  engine: ConversationEngine
  sender: WhatsAppSender
  queue: PartyQueue
  messages: Messages
  ownerPhone?: string
  logger?: Logger
}

export interface WebhookHandlerResult {
  handled: boolean
  action: 'flow_processed' | 'ignored_no_message' | 'ignored_duplicate' | 'store_unavailable'
  step?: Step
  delivered?: boolean
}

export function createWebhookHandler(deps: WebhookHandlerDeps) {
  const { engine, sender, queue, messages, ownerPhone } = deps
  const logger = deps.logger ?? createNoopLogger()

  function parsePayload(body: unknown): WebhookPayload {
    const result = webhookPayloadSchema.safeParse(body)
    if (!result.success) {
      const field = result.error.errors[0]?.path.join('.') ?? 'unknown'
      logger.error({ event: 'webhook_parse_error', error: result.error.message, field })
      throw new WebhookError(`Invalid webhook payload: ${result.error.message}`, field)
    }
    return result.data
  }

  async function notifyOwner(listing: ListingSummary): Promise<void> {
    if (!ownerPhone) {
      logger.warn({ event: 'owner_notification_skipped', partyId: listing.partyId })
      return
    }

    const body = getMessage(messages, 'owner_listing_summary', {
      name: listing.displayName ?? 'unknown',
      partyId: listing.partyId,
      summary: formatListingSummary(listing.attributes)
    })

    try {
      await sender.sendText(ownerPhone, body)
      logger.info({ event: 'owner_notified', partyId: listing.partyId })
    } catch (err) {
      logger.error({ event: 'owner_notification_failed', partyId: listing.partyId, error: err })
    }
  }

  async function apologise(partyId: string): Promise<void> {
    try {
      await sender.sendText(partyId, getMessage(messages, 'store_unavailable'))
    } catch (err) {
      logger.error({ event: 'apology_delivery_failed', partyId, error: err })
    }
  }

  async function processEvent(event: InboundEvent): Promise<WebhookHandlerResult> {
    let result: EngineResult
    try {
      result = await engine.handleEvent(event)
    } catch (err) {
      if (err instanceof StoreUnavailableError) {
        logger.error({ event: 'store_unavailable', partyId: event.partyId, operation: err.operation, error: err })
        await apologise(event.partyId)
        return { handled: false, action: 'store_unavailable' }
      }
      throw err
    }

    if (result.duplicate) {
      return { handled: false, action: 'ignored_duplicate' }
    }

    const delivered = await dispatchDirective(sender, result.directive, logger)

    if (result.confirmedListing) {
      await notifyOwner(result.confirmedListing)
    }

    logger.info({ event: 'flow_processed', partyId: event.partyId, step: result.step, delivered })
    return { handled: true, action: 'flow_processed', step: result.step, delivered }
  }

  async function handle(body: unknown): Promise<WebhookHandlerResult> {
    const payload = parsePayload(body)
    const event = extractInboundEvent(payload)

    if (event === null) {
      logger.info({ event: 'ignored_no_message' })
      return { handled: false, action: 'ignored_no_message' }
    }

    logger.info({
      event: 'webhook_received',
      partyId: event.partyId,
      deliveryId: event.deliveryId,
      kind: event.kind
    })

    return queue.run(event.partyId, () => processEvent(event))
  }

  return { handle, parsePayload }
}

export type WebhookHandler = ReturnType<typeof createWebhookHandler>

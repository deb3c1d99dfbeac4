import { createNoopLogger, type Logger } from '../logger.js'
import type { Messages } from '../messages.js'
import type { DedupFilter } from './dedup.js'
import { noopDirective } from './directives.js'
import { normalizeInput } from './normalizer.js'
import { applyMutation, transition } from './transitions.js'
import { STEPS, type EngineResult, type InboundEvent, type Session, type SessionStore, type Step, type StoredSession } from './types.js'

export interface ConversationEngineDeps {
  sessions: SessionStore
  dedup: DedupFilter
  messages: Messages
  logger?: Logger
  now?: () => number
}

export interface ConversationEngine {
  handleEvent(event: InboundEvent): Promise<EngineResult>
}

export function isStep(value: string): value is Step {
  return STEPS.some(step => step === value)
}

export function createConversationEngine(dependencies: ConversationEngineDeps): ConversationEngine {
  const { sessions, dedup, messages } = dependencies
  const logger = dependencies.logger ?? createNoopLogger()
  const now = dependencies.now ?? Date.now

  function createSession(partyId: string, displayName?: string): Session {
    const timestamp = now()
    return {
      partyId,
      step: 'start',
      displayName,
      verified: false,
      imageReceived: false,
      attributes: {},
      createdAt: timestamp,
      updatedAt: timestamp
    }
  }

  function restore(stored: StoredSession, event: InboundEvent): Session {
    const { step } = stored
    if (!isStep(step)) {
      logger.warn({ event: 'unknown_step', partyId: event.partyId, step })
      return createSession(event.partyId, stored.displayName ?? event.displayName)
    }
    return {
      ...stored,
      step,
      displayName: stored.displayName ?? event.displayName
    }
  }

  async function loadSession(event: InboundEvent): Promise<Session> {
    const stored = await sessions.load(event.partyId)
    if (!stored) {
      logger.info({ event: 'session_created', partyId: event.partyId })
      return createSession(event.partyId, event.displayName)
    }
    return restore(stored, event)
  }

  async function handleEvent(event: InboundEvent): Promise<EngineResult> {
    const { partyId, deliveryId } = event

    if (await dedup.isDuplicate(partyId, deliveryId)) {
      logger.info({ event: 'duplicate_delivery', partyId, deliveryId })
      return { directive: noopDirective(partyId), duplicate: true }
    }

    const session = await loadSession(event)
    const input = normalizeInput(event)
    const result = transition(session, input, { messages })

    if (!result.accepted) {
      logger.info({ event: 'input_rejected', partyId, step: session.step, kind: input.kind })
    }

    const updated = applyMutation(session, result.next, result.mutation, now())
    await sessions.save(partyId, updated)
    await dedup.record(partyId, deliveryId)

    logger.info({
      event: 'step_transition',
      partyId,
      from: session.step,
      to: updated.step,
      kind: input.kind,
      form: result.directive.form
    })

    return {
      directive: result.directive,
      duplicate: false,
      step: updated.step,
      confirmedListing: result.listingConfirmed
        ? { partyId, displayName: updated.displayName, attributes: updated.attributes }
        : undefined
    }
  }

  return { handleEvent }
}

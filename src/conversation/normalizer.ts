import type { InboundEvent, Input } from './types.js'

const GREETINGS = new Set(['hi', 'hie', 'hey', 'hello'])
const ROLES = new Set(['landlord', 'student'])

const WHOLE_NUMBER = /^[0-9]+$/
const DECIMAL_NUMBER = /^[0-9]+(\.[0-9]+)?$/

export function classifyText(raw: string): Input {
  const trimmed = raw.trim()
  const lowered = trimmed.toLowerCase()

  if (GREETINGS.has(lowered)) {
    return { kind: 'greeting', raw, normalized: lowered }
  }
  if (WHOLE_NUMBER.test(lowered)) {
    return { kind: 'number', raw, normalized: lowered }
  }
  if (DECIMAL_NUMBER.test(lowered)) {
    return { kind: 'decimal', raw, normalized: lowered }
  }
  if (lowered === 'yes' || lowered === 'no') {
    return { kind: 'yes_no', raw, normalized: lowered }
  }
  if (ROLES.has(lowered)) {
    return { kind: 'role_choice', raw, normalized: lowered }
  }
  // free-text answers such as an age range keep their casing
  return { kind: 'free_text', raw, normalized: trimmed }
}

export function normalizeInput(event: InboundEvent): Input {
  if (event.kind === 'image') {
    return { kind: 'image', raw: '', normalized: '' }
  }

  if (event.kind === 'interactive' && event.selectionId !== undefined) {
    return {
      kind: 'selection_id',
      raw: event.selectionId,
      normalized: event.selectionId.trim().toLowerCase()
    }
  }

  if (event.kind === 'text' && event.text !== undefined) {
    return classifyText(event.text)
  }

  return { kind: 'unrecognized', raw: event.text ?? event.selectionId ?? '', normalized: '' }
}

/**
 * Lower-cased token for exact matching against option ids, regardless of
 * whether the answer was typed or picked from a menu.
 */
export function answerToken(input: Input): string | undefined {
  switch (input.kind) {
    case 'greeting':
    case 'role_choice':
    case 'yes_no':
    case 'selection_id':
    case 'free_text':
      return input.normalized.toLowerCase()
    default:
      return undefined
  }
}

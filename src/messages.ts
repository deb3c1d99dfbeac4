import { readFileSync } from 'node:fs'
import { join, dirname } from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { MessagesError } from './errors.js'
import { logger } from './logger.js'

const __dirname = dirname(fileURLToPath(import.meta.url))

const messagesSchema = z.record(z.string())

export type Messages = z.infer<typeof messagesSchema>

export const REQUIRED_MESSAGE_KEYS = [
  'role_prompt',
  'role_title',
  'role_reprompt',
  'student_welcome',
  'image_prompt',
  'image_reprompt',
  'house_type_prompt',
  'house_type_title',
  'house_type_reprompt',
  'cat_prompt',
  'availability_prompt',
  'no_vacancies',
  'room_count_prompt',
  'room_count_invalid',
  'room_rent_prompt',
  'room_rent_invalid',
  'age_prompt',
  'confirm_prompt',
  'listing_confirmed',
  'listing_cancelled',
  'closing',
  'store_unavailable',
  'owner_listing_summary',
  'owner_startup'
] as const

export type MessageKey = typeof REQUIRED_MESSAGE_KEYS[number]

export function loadMessages(filePath?: string): Messages {
  const path = filePath ?? join(__dirname, 'messages', 'en.json')

  let messages: Messages
  try {
    const content = readFileSync(path, 'utf-8')
    messages = messagesSchema.parse(JSON.parse(content))
  } catch (err) {
    logger.error({ event: 'messages_load_failed', path, error: err })
    throw new MessagesError(`Failed to load messages from ${path}`, undefined)
  }

  const missing = REQUIRED_MESSAGE_KEYS.filter(key => typeof messages[key] !== 'string')
  if (missing.length > 0) {
    logger.error({ event: 'messages_incomplete', path, missing })
    throw new MessagesError(`Message key not found: ${missing[0]}`, missing[0])
  }

  logger.info({ event: 'messages_loaded', path, count: Object.keys(messages).length })
  return messages
}

export function getMessage(messages: Messages, key: MessageKey, values: Record<string, string | number> = {}): string {
  const template = messages[key]
  if (template === undefined) {
    logger.error({ event: 'message_key_not_found', key })
    throw new MessagesError(`Message key not found: ${key}`, key)
  }
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) => {
    const value = values[name]
    return value === undefined ? placeholder : String(value)
  })
}

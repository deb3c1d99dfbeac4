import { z } from 'zod'
import { createNoopLogger, type Logger } from '../logger.js'
import type { KeyValueStore } from '../storage/types.js'
import { HOUSE_TYPES, type DedupRecord, type DedupStore, type Session, type SessionStore, type StoredSession } from './types.js'

export const DEFAULT_SESSION_TTL_SECONDS = 60 * 60 * 24 * 2
export const DEFAULT_DEDUP_TTL_SECONDS = 60 * 60

const attributesSchema = z.object({
  houseType: z.enum(HOUSE_TYPES).optional(),
  hasCat: z.boolean().optional(),
  roomSingleCount: z.number().int().nonnegative().optional(),
  rentSingle: z.number().nonnegative().optional(),
  room2Count: z.number().int().nonnegative().optional(),
  rent2: z.number().nonnegative().optional(),
  room3Count: z.number().int().nonnegative().optional(),
  rent3: z.number().nonnegative().optional(),
  studentAge: z.string().optional()
})

const storedSessionSchema = z.object({
  partyId: z.string().min(1),
  step: z.string(),
  displayName: z.string().optional(),
  verified: z.boolean(),
  imageReceived: z.boolean(),
  attributes: attributesSchema,
  createdAt: z.number(),
  updatedAt: z.number()
})

const dedupRecordSchema = z.object({
  recentEventIds: z.array(z.string())
})

export function sessionKey(partyId: string): string {
  return `user:${partyId}`
}

export function dedupKey(partyId: string): string {
  return `dedup:${partyId}`
}

function parseStored<T>(raw: string, schema: z.ZodType<T>): T | undefined {
  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch {
    return undefined
  }
  const result = schema.safeParse(json)
  return result.success ? result.data : undefined
}

export function createSessionStore(
  store: KeyValueStore,
  ttlSeconds: number = DEFAULT_SESSION_TTL_SECONDS,
  logger?: Logger
): SessionStore {
  const log = logger ?? createNoopLogger()

  async function load(partyId: string): Promise<StoredSession | undefined> {
    const raw = await store.get(sessionKey(partyId))
    if (raw === undefined) {
      return undefined
    }
    const session = parseStored(raw, storedSessionSchema)
    if (!session) {
      log.warn({ event: 'session_record_invalid', partyId })
    }
    return session
  }

  async function save(partyId: string, session: Session): Promise<void> {
    await store.set(sessionKey(partyId), JSON.stringify(session), ttlSeconds)
  }

  return { load, save }
}

export function createDedupStore(
  store: KeyValueStore,
  ttlSeconds: number = DEFAULT_DEDUP_TTL_SECONDS,
  logger?: Logger
): DedupStore {
  const log = logger ?? createNoopLogger()

  async function load(partyId: string): Promise<DedupRecord | undefined> {
    const raw = await store.get(dedupKey(partyId))
    if (raw === undefined) {
      return undefined
    }
    const record = parseStored(raw, dedupRecordSchema)
    if (!record) {
      log.warn({ event: 'dedup_record_invalid', partyId })
    }
    return record
  }

  async function save(partyId: string, record: DedupRecord): Promise<void> {
    await store.set(dedupKey(partyId), JSON.stringify(record), ttlSeconds)
  }

  return { load, save }
}

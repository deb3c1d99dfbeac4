import { createNoopLogger, type Logger } from '../logger.js'
import type { DedupStore } from './types.js'

export const DEFAULT_DEDUP_CAPACITY = 5

export interface DedupFilter {
  isDuplicate(partyId: string, deliveryId: string): Promise<boolean>
  record(partyId: string, deliveryId: string): Promise<void>
  shouldProcess(partyId: string, deliveryId: string): Promise<boolean>
}

/** Oldest ids are evicted first; the newest id is always last. */
export function appendBounded(ids: readonly string[], id: string, capacity: number): string[] {
  const next = [...ids]
  while (next.length >= capacity) {
    next.shift()
  }
  next.push(id)
  return next
}

export function createDedupFilter(
  store: DedupStore,
  capacity: number = DEFAULT_DEDUP_CAPACITY,
  logger?: Logger
): DedupFilter {
  const log = logger ?? createNoopLogger()

  async function isDuplicate(partyId: string, deliveryId: string): Promise<boolean> {
    const record = await store.load(partyId)
    return record?.recentEventIds.includes(deliveryId) ?? false
  }

  async function record(partyId: string, deliveryId: string): Promise<void> {
    const existing = await store.load(partyId)
    const recentEventIds = appendBounded(existing?.recentEventIds ?? [], deliveryId, capacity)
    await store.save(partyId, { recentEventIds })
  }

  async function shouldProcess(partyId: string, deliveryId: string): Promise<boolean> {
    if (await isDuplicate(partyId, deliveryId)) {
      log.info({ event: 'duplicate_delivery', partyId, deliveryId })
      return false
    }
    await record(partyId, deliveryId)
    return true
  }

  return { isDuplicate, record, shouldProcess }
}

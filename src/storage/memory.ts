import type { KeyValueStore } from './types.js'

interface Entry {
  value: string
  expiresAt: number
}

export interface InMemoryStore extends KeyValueStore {
  cleanup(): void
  size(): number
}

export function createInMemoryStore(): InMemoryStore {
  const entries = new Map<string, Entry>()

  function isExpired(entry: Entry): boolean {
    return Date.now() > entry.expiresAt
  }

  async function get(key: string): Promise<string | undefined> {
    const entry = entries.get(key)
    if (!entry) {
      return undefined
    }
    if (isExpired(entry)) {
      entries.delete(key)
      return undefined
    }
    return entry.value
  }

  async function set(key: string, value: string, ttlSeconds: number): Promise<void> {
    entries.set(key, { value, expiresAt: Date.now() + ttlSeconds * 1000 })
  }

  function cleanup(): void {
    const now = Date.now()
    for (const [key, entry] of entries) {
      if (now > entry.expiresAt) {
        entries.delete(key)
      }
    }
  }

  function size(): number {
    return entries.size
  }

  return {
    get,
    set,
    cleanup,
    size
  }
}

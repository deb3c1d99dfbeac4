import { Redis } from 'ioredis'
import { StoreUnavailableError, type StoreOperation } from '../errors.js'
import { createNoopLogger, type Logger } from '../logger.js'
import type { KeyValueStore } from './types.js'

/** The slice of an ioredis client the store uses. */
export interface RedisClient {
  get(key: string): Promise<string | null>
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>
  quit(): Promise<unknown>
}

export interface RedisStore extends KeyValueStore {
  close(): Promise<void>
}

export function createRedisClient(url: string, logger?: Logger): RedisClient {
  const log = logger ?? createNoopLogger()
  const redis = new Redis(url, { maxRetriesPerRequest: 2 })

  redis.on('connect', () => {
    log.info({ event: 'redis_connected' })
  })
  redis.on('error', (error: Error) => {
    log.error({ event: 'redis_connection_error', error })
  })

  return {
    get: (key) => redis.get(key),
    set: (key, value, mode, seconds) => redis.set(key, value, mode, seconds),
    quit: () => redis.quit()
  }
}

export function createRedisStore(client: RedisClient, logger?: Logger): RedisStore {
  const log = logger ?? createNoopLogger()

  async function run<T>(operation: StoreOperation, key: string, command: () => Promise<T>): Promise<T> {
    try {
      return await command()
    } catch (err) {
      log.error({ event: 'redis_command_failed', operation, key, error: err })
      throw new StoreUnavailableError(`Redis ${operation} failed for ${key}`, operation, key, { cause: err })
    }
  }

  async function get(key: string): Promise<string | undefined> {
    const value = await run('get', key, () => client.get(key))
    return value ?? undefined
  }

  async function set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await run('set', key, () => client.set(key, value, 'EX', ttlSeconds))
  }

  async function close(): Promise<void> {
    try {
      await client.quit()
    } catch (err) {
      log.warn({ event: 'redis_quit_failed', error: err })
    }
  }

  return { get, set, close }
}

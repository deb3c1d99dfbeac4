import { loadConfig, type Config } from './config.js'
import { createLogger, type Logger } from './logger.js'
import { loadMessages, type Messages } from './messages.js'
import { createWhatsAppSender, createMockSender, type WhatsAppSender } from './whatsapp/sender.js'
import { createWebhookHandler, type WebhookHandler } from './webhook/handler.js'
import { createConversationEngine, type ConversationEngine } from './conversation/engine.js'
import { createDedupFilter } from './conversation/dedup.js'
import { createPartyQueue } from './conversation/party-queue.js'
import { createDedupStore, createSessionStore } from './conversation/session-store.js'
import { createInMemoryStore } from './storage/memory.js'
import { createRedisClient, createRedisStore } from './storage/redis.js'
import type { KeyValueStore } from './storage/types.js'
import { createServer } from './server.js'
import type { FastifyInstance } from 'fastify'

const MEMORY_CLEANUP_INTERVAL_MS = 60 * 1000

export interface AppDependencies {
  config: Config
  logger: Logger
  messages: Messages
  sender: WhatsAppSender
  store: KeyValueStore
  engine: ConversationEngine
  webhookHandler: WebhookHandler
}

export interface App {
  server: FastifyInstance
  dependencies: AppDependencies
}

export interface AppOverrides {
  env?: NodeJS.ProcessEnv
  sender?: WhatsAppSender
  store?: KeyValueStore
}

export function createApp(overrides: AppOverrides = {}): App {
  const config = loadConfig(overrides.env)
  const logger = createLogger('accommodation-intake-bot', config.logLevel)
  const messages = loadMessages()

  let sender: WhatsAppSender
  if (overrides.sender) {
    sender = overrides.sender
  } else if (config.mockMode) {
    sender = createMockSender(logger)
    logger.warn({ event: 'mock_mode_enabled' })
  } else {
    sender = createWhatsAppSender(config.whatsApp, logger)
  }

  const onClose: Array<() => Promise<void>> = []
  let store: KeyValueStore
  if (overrides.store) {
    store = overrides.store
  } else if (config.redisUrl) {
    const redisStore = createRedisStore(createRedisClient(config.redisUrl, logger), logger)
    onClose.push(() => redisStore.close())
    store = redisStore
  } else {
    const memoryStore = createInMemoryStore()
    const cleanupTimer = setInterval(() => memoryStore.cleanup(), MEMORY_CLEANUP_INTERVAL_MS)
    cleanupTimer.unref()
    onClose.push(async () => clearInterval(cleanupTimer))
    store = memoryStore
    logger.warn({ event: 'memory_store_enabled', hint: 'Set REDIS_URL to keep sessions across restarts' })
  }

  const engine = createConversationEngine({
    sessions: createSessionStore(store, config.sessionTtlSeconds, logger),
    dedup: createDedupFilter(createDedupStore(store, config.dedupTtlSeconds, logger), config.dedupCapacity, logger),
    messages,
    logger
  })

  const webhookHandler = createWebhookHandler({
    engine,
    sender,
    queue: createPartyQueue(),
    messages,
    ownerPhone: config.ownerPhone,
    logger
  })

  logger.info({ event: 'dependencies_loaded', messageKeys: Object.keys(messages).length })

  const server = createServer(config, logger, webhookHandler)
  server.addHook('onClose', async () => {
    for (const close of onClose) {
      await close()
    }
  })

  return {
    server,
    dependencies: { config, logger, messages, sender, store, engine, webhookHandler }
  }
}

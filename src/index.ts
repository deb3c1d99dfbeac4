import 'dotenv/config'
import { createApp } from './app.js'
import { getMessage } from './messages.js'
import { logger as bootLogger } from './logger.js'

async function main() {
  const { server, dependencies } = createApp()
  const { config, logger, messages, sender } = dependencies

  try {
    await server.listen({ port: config.port, host: '0.0.0.0' })
    logger.info({ event: 'server_started', port: config.port })
  } catch (err) {
    logger.error({ event: 'server_start_failed', error: err })
    process.exit(1)
  }

  if (config.ownerPhone) {
    try {
      await sender.sendText(config.ownerPhone, getMessage(messages, 'owner_startup'))
      logger.info({ event: 'owner_startup_notified' })
    } catch (err) {
      logger.error({ event: 'owner_startup_notification_failed', error: err })
    }
  }
}

main().catch((err: unknown) => {
  bootLogger.error({ event: 'startup_failed', error: err })
  process.exit(1)
})

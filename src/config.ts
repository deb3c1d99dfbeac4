import { z } from 'zod'
import { ConfigError } from './errors.js'
import { logger } from './logger.js'

const coerceBooleanFromEnvVar = z
  .union([z.boolean(), z.string()])
  .transform((val) => {
    if (typeof val === 'boolean') return val
    return val.toLowerCase() === 'true'
  })
  .default(false)

const optionalNonEmpty = z
  .string()
  .optional()
  .transform((val) => (val === undefined || val.trim() === '' ? undefined : val.trim()))

const configSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  mockMode: coerceBooleanFromEnvVar,
  verifyToken: z.string({ required_error: 'WHATSAPP_VERIFY_TOKEN is required' }).min(1, 'WHATSAPP_VERIFY_TOKEN cannot be empty'),
  ownerPhone: optionalNonEmpty,
  redisUrl: optionalNonEmpty,
  sessionTtlSeconds: z.coerce.number().int().min(60).default(60 * 60 * 24 * 2),
  dedupTtlSeconds: z.coerce.number().int().min(60).default(60 * 60),
  dedupCapacity: z.coerce.number().int().min(1).max(100).default(5),
  whatsApp: z.object({
    token: z.string({ required_error: 'WHATSAPP_TOKEN is required' }).min(1, 'WHATSAPP_TOKEN cannot be empty'),
    phoneNumberId: z.string({ required_error: 'WHATSAPP_PHONE_ID is required' }).min(1, 'WHATSAPP_PHONE_ID cannot be empty'),
    apiVersion: z.string().regex(/^v\d+\.\d+$/, 'WHATSAPP_API_VERSION must look like v19.0').default('v19.0')
  })
})

export type Config = z.infer<typeof configSchema>

const envVarByField: Record<string, string> = {
  'port': 'PORT',
  'logLevel': 'LOG_LEVEL',
  'mockMode': 'MOCK_MODE',
  'verifyToken': 'WHATSAPP_VERIFY_TOKEN',
  'ownerPhone': 'OWNER_PHONE',
  'redisUrl': 'REDIS_URL',
  'sessionTtlSeconds': 'SESSION_TTL_SECONDS',
  'dedupTtlSeconds': 'DEDUP_TTL_SECONDS',
  'dedupCapacity': 'DEDUP_CAPACITY',
  'whatsApp.token': 'WHATSAPP_TOKEN',
  'whatsApp.phoneNumberId': 'WHATSAPP_PHONE_ID',
  'whatsApp.apiVersion': 'WHATSAPP_API_VERSION'
}

export function fieldToEnvVar(field: string): string {
  return envVarByField[field] ?? field.toUpperCase()
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse({
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    mockMode: env.MOCK_MODE,
    verifyToken: env.WHATSAPP_VERIFY_TOKEN,
    ownerPhone: env.OWNER_PHONE,
    redisUrl: env.REDIS_URL,
    sessionTtlSeconds: env.SESSION_TTL_SECONDS,
    dedupTtlSeconds: env.DEDUP_TTL_SECONDS,
    dedupCapacity: env.DEDUP_CAPACITY,
    whatsApp: {
      token: env.WHATSAPP_TOKEN,
      phoneNumberId: env.WHATSAPP_PHONE_ID,
      apiVersion: env.WHATSAPP_API_VERSION
    }
  })

  if (!result.success) {
    const missingVars: string[] = []
    const errors = result.error.errors.map(e => {
      const field = e.path.join('.')
      const envVarName = fieldToEnvVar(field)
      if (e.code === 'invalid_type' && e.received === 'undefined') {
        missingVars.push(envVarName)
      }
      return { field, envVar: envVarName, message: e.message }
    })

    logger.error({ event: 'config_validation_failed', errors })

    if (missingVars.length > 0) {
      logger.error({
        event: 'missing_environment_variables',
        missing: missingVars,
        hint: 'Add these variables to your environment or .env file'
      })
    }

    const firstError = result.error.errors[0]
    const field = firstError?.path.join('.')
    throw new ConfigError(firstError?.message ?? 'Invalid configuration', field)
  }

  logger.info({
    event: 'config_loaded',
    port: result.data.port,
    logLevel: result.data.logLevel,
    storage: result.data.redisUrl ? 'redis' : 'memory',
    ownerNotifications: result.data.ownerPhone !== undefined
  })
  return result.data
}

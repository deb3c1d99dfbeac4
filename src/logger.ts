import { pino } from 'pino'

export interface Logger {
  info(obj: object, msg?: string): void
  warn(obj: object, msg?: string): void
  error(obj: object, msg?: string): void
}

const noopFn = () => {}

const noopLogger: Logger = {
  info: noopFn,
  warn: noopFn,
  error: noopFn
}

export function createNoopLogger(): Logger {
  return noopLogger
}

export function createLogger(name: string, level: string = process.env.LOG_LEVEL ?? 'info'): Logger {
  return pino({
    name,
    level,
    formatters: {
      level: (label: string) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ['*.token', '*.verifyToken', '*.secret', '*.password'],
      censor: '[REDACTED]'
    }
  })
}

export const logger = createLogger('accommodation-intake-bot')

import pino, { type Logger, type LoggerOptions } from 'pino'

export type { Logger } from 'pino'

export interface CreateLoggerOptions {
  name: string
  /** Falls back to LOG_LEVEL, then to defaultLevel */
  level?: string
  defaultLevel?: string
}

/**
 * Create a pino logger, pretty-printed when NODE_ENV is development
 */
export function createLogger (options: CreateLoggerOptions): Logger {
  const config: LoggerOptions = {
    level: options.level || process.env.LOG_LEVEL || options.defaultLevel || 'info',
    name: options.name,
    redact: ['headers.authorization', 'token'],
    ...(process.env.NODE_ENV === 'development'
      ? {
          transport: {
            target: 'pino-pretty',
            options: { colorize: true }
          }
        }
      : {})
  }
  return pino(config)
}

import pino from 'pino'

export type Logger = pino.Logger
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent'

export interface LoggerOptions {
  name?: string
  level?: LogLevel
  /** Where log lines go; defaults to stdout. */
  destination?: pino.DestinationStream
}

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

/**
 * Level from TREBLLE_LOG_LEVEL or LOG_LEVEL. Tests run silent unless a level
 * is set explicitly.
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const requested = (env.TREBLLE_LOG_LEVEL ?? env.LOG_LEVEL)?.toLowerCase()
  const known = LOG_LEVELS.find(level => level === requested)
  if (known) {
    return known
  }
  return env.NODE_ENV === 'test' ? 'silent' : 'info'
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const settings: pino.LoggerOptions = {
    name: options.name ?? 'treblle',
    level: options.level ?? getLogLevel(),
    redact: {
      paths: [
        'apiKey',
        'api_key',
        'config.apiKey',
        'payload.api_key',
        'headers["x-api-key"]',
        'request.headers["x-api-key"]'
      ],
      censor: '[REDACTED]'
    },
    serializers: {
      err: pino.stdSerializers.err
    }
  }
  return options.destination ? pino(settings, options.destination) : pino(settings)
}

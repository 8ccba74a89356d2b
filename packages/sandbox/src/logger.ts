import { createLogger, type Logger, type LogLevel } from '@treblle-node/core'
import { HostLogLevel, type HostFunctions, type HostLogLevelValue } from './host.js'
import type { SandboxLogLevel } from './config.js'

const PINO_LEVELS: Record<SandboxLogLevel, LogLevel> = {
  debug: 'debug',
  info: 'info',
  warn: 'warn',
  error: 'error',
  none: 'silent'
}

function hostLevel(line: string): HostLogLevelValue {
  const level = Number(/"level":(\d+)/.exec(line)?.[1] ?? 30)
  if (level >= 50) return HostLogLevel.Error
  if (level >= 40) return HostLogLevel.Warn
  if (level >= 30) return HostLogLevel.Info
  return HostLogLevel.Debug
}

/** pino logger whose lines go to the host's log sink at the matching level. */
export function createHostLogger(host: HostFunctions, level: SandboxLogLevel): Logger {
  return createLogger({
    name: 'treblle-sandbox',
    level: PINO_LEVELS[level],
    destination: {
      write(line: string) {
        host.log(hostLevel(line), line.trimEnd())
      }
    }
  })
}

import { z } from 'zod'
import { Config, ConfigError, applyConfigFile, configFileSchema, errorMessage } from '@treblle-node/core'

export const sandboxLogLevels = ['debug', 'info', 'warn', 'error', 'none'] as const
export type SandboxLogLevel = (typeof sandboxLogLevels)[number]

/** Core settings plus what only the plugin host knows about. */
export const sandboxConfigSchema = configFileSchema.extend({
  buffer_response: z.boolean().default(false),
  log_level: z
    .string()
    .transform(level => level.toLowerCase())
    .transform(level => (level === 'warning' ? 'warn' : level))
    .pipe(z.enum(sandboxLogLevels))
    .default('none')
})

export interface SandboxSettings {
  config: Config
  /** Ask the host to buffer responses so their bodies can be read. */
  bufferResponse: boolean
  logLevel: SandboxLogLevel
}

export function parseSandboxConfig(json: string): SandboxSettings {
  let raw: unknown
  try {
    raw = JSON.parse(json)
  } catch (error) {
    throw new ConfigError('InvalidShape', `Invalid plugin configuration: ${errorMessage(error)}`, { cause: error })
  }

  const parsed = sandboxConfigSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    throw new ConfigError('InvalidShape', `Invalid plugin configuration: ${issues.join('; ')}`)
  }

  const settings = parsed.data
  return {
    config: applyConfigFile(Config.builder(settings.api_key, settings.project_id), settings).build(),
    bufferResponse: settings.buffer_response,
    logLevel: settings.log_level
  }
}

import { existsSync, readFileSync } from 'node:fs'
import dotenv from 'dotenv'
import yaml from 'js-yaml'
import { z } from 'zod'
import { Config, type ConfigBuilder } from './config.js'
import { ConfigError, errorMessage } from './errors.js'

const listSchema = z.array(z.string())

/** Shape of a configuration file (YAML or JSON) or plain object. */
export const configFileSchema = z.object({
  api_key: z.string(),
  project_id: z.string(),
  api_urls: listSchema.optional(),
  masked_fields: listSchema.optional(),
  ignored_routes: listSchema.optional(),
  max_mask_depth: z.number().int().positive().optional(),
  timeout_ms: z.number().positive().optional(),
  non_json_body_policy: z.enum(['omit', 'raw']).optional(),
  endpoint_strategy: z.enum(['primary', 'round-robin']).optional(),
  root_ca_path: z.string().optional()
})

export type ConfigFile = z.infer<typeof configFileSchema>

const commaList = z
  .string()
  .transform(value => value.split(',').map(item => item.trim()).filter(item => item.length > 0))

const envSchema = z.object({
  API_KEY: z.string().default(''),
  PROJECT_ID: z.string().default(''),
  API_URL: commaList.optional(),
  MASKED_FIELDS: commaList.optional(),
  IGNORED_ROUTES: commaList.optional(),
  MAX_MASK_DEPTH: z.coerce.number().int().positive().optional(),
  TIMEOUT_MS: z.coerce.number().positive().optional(),
  NON_JSON_BODY_POLICY: z.enum(['omit', 'raw']).optional(),
  ENDPOINT_STRATEGY: z.enum(['primary', 'round-robin']).optional(),
  ROOT_CA_PATH: z.string().optional()
})

export interface LoadEnvOptions {
  env?: NodeJS.ProcessEnv
  /** A dotenv file merged under `env`; values already in `env` win. */
  envFile?: string
}

/**
 * Builds a Config from environment variables. Missing credentials fail here,
 * at construction, never later at request time.
 */
export function loadConfigFromEnv(options: LoadEnvOptions = {}): Config {
  const fromFile = options.envFile ? readEnvFile(options.envFile) : {}
  const merged = { ...fromFile, ...(options.env ?? process.env) }
  const parsed = envSchema.safeParse(merged)
  if (!parsed.success) {
    throw new ConfigError('InvalidShape', `Invalid environment: ${formatIssues(parsed.error)}`)
  }

  const env = parsed.data
  const builder = Config.builder(env.API_KEY, env.PROJECT_ID)
  if (env.API_URL && env.API_URL.length > 0) builder.setApiUrls(env.API_URL)
  if (env.MASKED_FIELDS) builder.addMaskedFields(env.MASKED_FIELDS)
  if (env.IGNORED_ROUTES) builder.addIgnoredRoutes(env.IGNORED_ROUTES)
  if (env.MAX_MASK_DEPTH !== undefined) builder.setMaxMaskDepth(env.MAX_MASK_DEPTH)
  if (env.TIMEOUT_MS !== undefined) builder.setTimeout(env.TIMEOUT_MS)
  if (env.NON_JSON_BODY_POLICY) builder.setNonJsonBodyPolicy(env.NON_JSON_BODY_POLICY)
  if (env.ENDPOINT_STRATEGY) builder.setEndpointStrategy(env.ENDPOINT_STRATEGY)
  if (env.ROOT_CA_PATH) builder.setRootCaPath(env.ROOT_CA_PATH)
  return builder.build()
}

/** Reads a YAML or JSON configuration file. */
export function loadConfigFile(path: string): Config {
  if (!existsSync(path)) {
    throw new ConfigError('InvalidShape', `Config file not found: ${path}`)
  }

  let raw: unknown
  try {
    raw = yaml.load(readFileSync(path, 'utf8'))
  } catch (error) {
    throw new ConfigError('InvalidShape', `Failed to parse config file ${path}: ${errorMessage(error)}`, {
      cause: error
    })
  }
  return configFromObject(raw)
}

/** Parses a JSON document, e.g. the configuration string a plugin host hands over. */
export function configFromJson(json: string): Config {
  let raw: unknown
  try {
    raw = JSON.parse(json)
  } catch (error) {
    throw new ConfigError('InvalidShape', `Invalid JSON configuration: ${errorMessage(error)}`, { cause: error })
  }
  return configFromObject(raw)
}

/**
 * Validates a plain object. Listed masked fields and ignored routes extend
 * the defaults.
 */
export function configFromObject(raw: unknown): Config {
  const parsed = configFileSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError('InvalidShape', `Invalid configuration: ${formatIssues(parsed.error)}`)
  }
  return applyConfigFile(Config.builder(parsed.data.api_key, parsed.data.project_id), parsed.data).build()
}

export function applyConfigFile(builder: ConfigBuilder, file: ConfigFile): ConfigBuilder {
  if (file.api_urls) builder.setApiUrls(file.api_urls)
  if (file.masked_fields) builder.addMaskedFields(file.masked_fields)
  if (file.ignored_routes) builder.addIgnoredRoutes(file.ignored_routes)
  if (file.max_mask_depth !== undefined) builder.setMaxMaskDepth(file.max_mask_depth)
  if (file.timeout_ms !== undefined) builder.setTimeout(file.timeout_ms)
  if (file.non_json_body_policy) builder.setNonJsonBodyPolicy(file.non_json_body_policy)
  if (file.endpoint_strategy) builder.setEndpointStrategy(file.endpoint_strategy)
  if (file.root_ca_path !== undefined) builder.setRootCaPath(file.root_ca_path)
  return builder
}

function readEnvFile(path: string): Record<string, string> {
  if (!existsSync(path)) {
    throw new ConfigError('InvalidShape', `Env file not found: ${path}`)
  }
  return dotenv.parse(readFileSync(path))
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
}

import {
  DEFAULT_API_URLS,
  DEFAULT_IGNORED_ROUTES,
  DEFAULT_MASKED_FIELDS,
  DEFAULT_MAX_MASK_DEPTH,
  DEFAULT_TIMEOUT_MS
} from './constants.js'
import { RouteBlacklist } from './blacklist.js'
import { ConfigError } from './errors.js'
import { MaskingEngine } from './masking.js'
import { PatternSet } from './patterns.js'

/** What happens to a body whose content type is not JSON. */
export type NonJsonBodyPolicy = 'omit' | 'raw'

/** How the base URL is picked for each observation. One attempt either way. */
export type EndpointStrategy = 'primary' | 'round-robin'

export interface ConfigSnapshot {
  apiKey: string
  projectId: string
  apiUrls: readonly string[]
  maskedFields: readonly string[]
  ignoredRoutes: readonly string[]
  maxMaskDepth: number
  timeoutMs: number
  nonJsonBodyPolicy: NonJsonBodyPolicy
  endpointStrategy: EndpointStrategy
  rootCaPath?: string
}

/**
 * Validated, frozen settings shared read-only by every request path. Built
 * through {@link ConfigBuilder}; pattern sets are compiled exactly once.
 */
export class Config {
  readonly apiKey: string
  readonly projectId: string
  readonly apiUrls: readonly string[]
  readonly maskedFields: PatternSet
  readonly ignoredRoutes: PatternSet
  readonly maxMaskDepth: number
  readonly timeoutMs: number
  readonly nonJsonBodyPolicy: NonJsonBodyPolicy
  readonly endpointStrategy: EndpointStrategy
  readonly rootCaPath?: string
  readonly blacklist: RouteBlacklist
  readonly masking: MaskingEngine

  /** @internal use {@link ConfigBuilder.build} */
  constructor(settings: {
    apiKey: string
    projectId: string
    apiUrls: readonly string[]
    maskedFields: PatternSet
    ignoredRoutes: PatternSet
    maxMaskDepth: number
    timeoutMs: number
    nonJsonBodyPolicy: NonJsonBodyPolicy
    endpointStrategy: EndpointStrategy
    rootCaPath?: string
  }) {
    this.apiKey = settings.apiKey
    this.projectId = settings.projectId
    this.apiUrls = Object.freeze([...settings.apiUrls])
    this.maskedFields = settings.maskedFields
    this.ignoredRoutes = settings.ignoredRoutes
    this.maxMaskDepth = settings.maxMaskDepth
    this.timeoutMs = settings.timeoutMs
    this.nonJsonBodyPolicy = settings.nonJsonBodyPolicy
    this.endpointStrategy = settings.endpointStrategy
    this.rootCaPath = settings.rootCaPath
    this.blacklist = new RouteBlacklist(settings.ignoredRoutes)
    this.masking = new MaskingEngine(settings.maskedFields, { maxDepth: settings.maxMaskDepth })
    Object.freeze(this)
  }

  static builder(apiKey: string, projectId: string): ConfigBuilder {
    return new ConfigBuilder(apiKey, projectId)
  }

  get primaryApiUrl(): string {
    return this.apiUrls[0]
  }

  isIgnored(path: string): boolean {
    return this.blacklist.isIgnored(path)
  }

  /** Serializable view for diagnostics. The API key is not included in full. */
  toJSON(): ConfigSnapshot {
    return {
      apiKey: redactKey(this.apiKey),
      projectId: this.projectId,
      apiUrls: this.apiUrls,
      maskedFields: this.maskedFields.sources,
      ignoredRoutes: this.ignoredRoutes.sources,
      maxMaskDepth: this.maxMaskDepth,
      timeoutMs: this.timeoutMs,
      nonJsonBodyPolicy: this.nonJsonBodyPolicy,
      endpointStrategy: this.endpointStrategy,
      rootCaPath: this.rootCaPath
    }
  }
}

export class ConfigBuilder {
  private maskedFields: PatternSet
  private ignoredRoutes: PatternSet
  private apiUrls: readonly string[] = DEFAULT_API_URLS
  private maxMaskDepth = DEFAULT_MAX_MASK_DEPTH
  private timeoutMs = DEFAULT_TIMEOUT_MS
  private nonJsonBodyPolicy: NonJsonBodyPolicy = 'omit'
  private endpointStrategy: EndpointStrategy = 'primary'
  private rootCaPath?: string

  constructor(private readonly apiKey: string, private readonly projectId: string) {
    this.maskedFields = maskedFieldSet(DEFAULT_MASKED_FIELDS)
    this.ignoredRoutes = ignoredRouteSet(DEFAULT_IGNORED_ROUTES)
  }

  /** Extends the masked field set. Patterns are case-insensitive. */
  addMaskedFields(patterns: readonly string[]): this {
    this.maskedFields = maskedFieldSet([...this.maskedFields.sources, ...patterns])
    return this
  }

  /** Replaces the masked field set, defaults included. */
  setMaskedFields(patterns: readonly string[]): this {
    this.maskedFields = maskedFieldSet(patterns)
    return this
  }

  addIgnoredRoutes(patterns: readonly string[]): this {
    this.ignoredRoutes = ignoredRouteSet([...this.ignoredRoutes.sources, ...patterns])
    return this
  }

  setIgnoredRoutes(patterns: readonly string[]): this {
    this.ignoredRoutes = ignoredRouteSet(patterns)
    return this
  }

  setApiUrls(urls: readonly string[]): this {
    if (urls.length === 0) {
      throw new ConfigError('NoEndpoints', 'At least one API URL is required')
    }
    for (const url of urls) {
      if (!isHttpUrl(url)) {
        throw new ConfigError('NoEndpoints', `Invalid API URL "${url}"`)
      }
    }
    this.apiUrls = [...urls]
    return this
  }

  setMaxMaskDepth(depth: number): this {
    if (!Number.isInteger(depth) || depth < 1) {
      throw new ConfigError('InvalidShape', `maxMaskDepth must be a positive integer, got ${depth}`)
    }
    this.maxMaskDepth = depth
    return this
  }

  setTimeout(timeoutMs: number): this {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigError('InvalidShape', `timeoutMs must be positive, got ${timeoutMs}`)
    }
    this.timeoutMs = timeoutMs
    return this
  }

  setNonJsonBodyPolicy(policy: NonJsonBodyPolicy): this {
    this.nonJsonBodyPolicy = policy
    return this
  }

  setEndpointStrategy(strategy: EndpointStrategy): this {
    this.endpointStrategy = strategy
    return this
  }

  setRootCaPath(path: string): this {
    if (path.trim().length === 0) {
      throw new ConfigError('InvalidShape', 'Root CA path cannot be empty')
    }
    this.rootCaPath = path
    return this
  }

  build(): Config {
    if (this.apiKey.trim().length === 0) {
      throw new ConfigError('InvalidCredential', 'API key is required')
    }
    if (this.projectId.trim().length === 0) {
      throw new ConfigError('InvalidCredential', 'Project ID is required')
    }
    if (CONTROL_CHARACTER.test(this.apiKey)) {
      throw new ConfigError('InvalidCredential', 'API key contains control characters')
    }
    return new Config({
      apiKey: this.apiKey,
      projectId: this.projectId,
      apiUrls: this.apiUrls,
      maskedFields: this.maskedFields,
      ignoredRoutes: this.ignoredRoutes,
      maxMaskDepth: this.maxMaskDepth,
      timeoutMs: this.timeoutMs,
      nonJsonBodyPolicy: this.nonJsonBodyPolicy,
      endpointStrategy: this.endpointStrategy,
      rootCaPath: this.rootCaPath
    })
  }
}

// Sent as a header value; a line break would split the request.
const CONTROL_CHARACTER = /[\x00-\x1f\x7f]/

function maskedFieldSet(patterns: readonly string[]): PatternSet {
  return new PatternSet(patterns, { caseInsensitive: true, label: 'masked field' })
}

function ignoredRouteSet(patterns: readonly string[]): PatternSet {
  return new PatternSet(patterns, { caseInsensitive: false, label: 'ignored route' })
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value)
    return url.protocol === 'https:' || url.protocol === 'http:'
  } catch {
    return false
  }
}

function redactKey(key: string): string {
  return key.length <= 4 ? '****' : `${key.slice(0, 4)}****`
}

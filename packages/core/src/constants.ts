export const SDK_NAME = 'treblle-node'
export const SDK_VERSION = '0.1.0'
export const PAYLOAD_VERSION = 0.1

export const DEFAULT_API_URLS: readonly string[] = [
  'https://rocknrolla.treblle.com',
  'https://punisher.treblle.com',
  'https://sicario.treblle.com'
]

/**
 * Field-name patterns masked by default. Each entry is matched as a
 * case-insensitive regex against object keys (substring semantics).
 */
export const DEFAULT_MASKED_FIELDS: readonly string[] = [
  'password',
  'pwd',
  'secret',
  'password_confirmation',
  'card',
  'ccv',
  'cvv',
  'cvc',
  'ssn',
  'credit_score',
  'token',
  'api[-_]?key',
  'access[-_]?key',
  'private[-_]?key',
  'authorization'
]

/** Health and metrics endpoints skipped by default. */
export const DEFAULT_IGNORED_ROUTES: readonly string[] = [
  '^/(health|healthz|ping|metrics|ready|live|alive|status)/?$'
]

export const MASK_TOKEN = '*****'

export const DEFAULT_MAX_MASK_DEPTH = 64
export const DEFAULT_TIMEOUT_MS = 10_000

export const HEADER_CONTENT_TYPE = 'Content-Type'
export const HEADER_API_KEY = 'x-api-key'
export const JSON_CONTENT_TYPE = 'application/json'

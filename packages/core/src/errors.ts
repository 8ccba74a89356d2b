export type ConfigErrorKind = 'InvalidCredential' | 'InvalidPattern' | 'NoEndpoints' | 'InvalidShape'
export type BuildErrorKind = 'IncompleteExtraction'
export type TransportErrorKind =
  | 'ConnectFailed'
  | 'TlsValidation'
  | 'Timeout'
  | 'NonSuccessStatus'
  | 'InvalidUrl'
  | 'InvalidHeader'
  | 'MalformedResponse'
  | 'Closed'

export type TreblleErrorKind = ConfigErrorKind | BuildErrorKind | TransportErrorKind

export abstract class TreblleError<K extends TreblleErrorKind = TreblleErrorKind> extends Error {
  readonly kind: K

  constructor(kind: K, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.kind = kind
  }
}

/**
 * Raised while building a Config. The only error type that ever leaves the
 * core, and only at construction time.
 */
export class ConfigError extends TreblleError<ConfigErrorKind> {
  override readonly name = 'ConfigError'
}

/** Adapter handed over extraction data without its mandatory fields. */
export class BuildError extends TreblleError<BuildErrorKind> {
  override readonly name = 'BuildError'
  readonly missing: readonly string[]

  constructor(missing: readonly string[]) {
    super('IncompleteExtraction', `Incomplete extraction: ${missing.join(', ')}`)
    this.missing = missing
  }
}

export class TransportError extends TreblleError<TransportErrorKind> {
  override readonly name = 'TransportError'
  readonly statusCode?: number

  constructor(
    kind: TransportErrorKind,
    message: string,
    options: { cause?: unknown; statusCode?: number } = {}
  ) {
    super(kind, message, { cause: options.cause })
    this.statusCode = options.statusCode
  }
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

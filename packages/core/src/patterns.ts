import { ConfigError } from './errors.js'

export interface PatternSetOptions {
  caseInsensitive: boolean
  /** Label used in error messages, e.g. "masked field". */
  label: string
}

/**
 * An immutable, compiled set of regular expressions. Compilation happens once,
 * in the constructor; `test` never allocates.
 */
export class PatternSet {
  readonly sources: readonly string[]
  private readonly compiled: readonly RegExp[]

  constructor(sources: readonly string[], options: PatternSetOptions) {
    const flags = options.caseInsensitive ? 'i' : ''
    const unique = [...new Set(sources)]
    this.compiled = Object.freeze(unique.map(source => compile(source, flags, options.label)))
    this.sources = Object.freeze(unique)
  }

  test(value: string): boolean {
    for (const pattern of this.compiled) {
      if (pattern.test(value)) {
        return true
      }
    }
    return false
  }

  get size(): number {
    return this.compiled.length
  }
}

function compile(source: string, flags: string, label: string): RegExp {
  if (source.length === 0) {
    throw new ConfigError('InvalidPattern', `Empty ${label} pattern`)
  }
  try {
    return new RegExp(source, flags)
  } catch (error) {
    throw new ConfigError('InvalidPattern', `Invalid ${label} pattern "${source}"`, { cause: error })
  }
}

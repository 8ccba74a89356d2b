import { DEFAULT_MAX_MASK_DEPTH, MASK_TOKEN } from './constants.js'
import { setOwn, type JsonArray, type JsonObject, type JsonValue } from './json.js'
import type { PatternSet } from './patterns.js'

export interface MaskingOptions {
  /** Containers nested deeper than this are carried over untraversed. */
  maxDepth?: number
  token?: string
}

type Frame =
  | { kind: 'object'; source: JsonObject; target: JsonObject; depth: number }
  | { kind: 'array'; source: JsonArray; target: JsonArray; depth: number }

/**
 * Redacts values whose key matches a sensitive-field pattern.
 *
 * The walk uses an explicit stack, never recursion. A matching key has its
 * whole value replaced by the token, whatever its type; the matched subtree
 * is not visited. The input is never mutated: containers are rebuilt, except
 * over-depth subtrees which are referenced as they are.
 */
export class MaskingEngine {
  readonly maxDepth: number
  readonly token: string

  constructor(private readonly fields: PatternSet, options: MaskingOptions = {}) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_MASK_DEPTH
    this.token = options.token ?? MASK_TOKEN
  }

  isSensitive(key: string): boolean {
    return this.fields.test(key)
  }

  mask(value: JsonValue): JsonValue {
    if (typeof value !== 'object' || value === null) {
      return value
    }

    const stack: Frame[] = []
    const root = this.open(value, 0, stack)

    let frame: Frame | undefined
    while ((frame = stack.pop()) !== undefined) {
      const childDepth = frame.depth + 1
      if (frame.kind === 'object') {
        for (const key of Object.keys(frame.source)) {
          const replacement = this.fields.test(key)
            ? this.token
            : this.visit(frame.source[key], childDepth, stack)
          setOwn(frame.target, key, replacement)
        }
      } else {
        for (const item of frame.source) {
          frame.target.push(this.visit(item, childDepth, stack))
        }
      }
    }

    return root
  }

  maskHeaders(headers: Readonly<Record<string, string>>): Record<string, string> {
    const masked: Record<string, string> = {}
    for (const [name, value] of Object.entries(headers)) {
      masked[name] = this.fields.test(name) ? this.token : value
    }
    return masked
  }

  private visit(value: JsonValue, depth: number, stack: Frame[]): JsonValue {
    if (typeof value !== 'object' || value === null) {
      return value
    }
    if (depth > this.maxDepth) {
      return value
    }
    return this.open(value, depth, stack)
  }

  private open(value: JsonObject | JsonArray, depth: number, stack: Frame[]): JsonObject | JsonArray {
    if (Array.isArray(value)) {
      const target: JsonArray = []
      stack.push({ kind: 'array', source: value, target, depth })
      return target
    }
    const target: JsonObject = {}
    stack.push({ kind: 'object', source: value, target, depth })
    return target
  }
}

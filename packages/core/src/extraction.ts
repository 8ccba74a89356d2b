import type { NonJsonBodyPolicy } from './config.js'
import { setOwn, type JsonValue } from './json.js'
import type { ErrorInfo, RequestInfo, ResponseInfo } from './schema.js'

/**
 * What a host adapter implements to feed the pipeline. Extraction must not
 * consume anything the host still needs: bodies are read from copies or
 * written back.
 */
export interface Extractor<Req, Res> {
  extractRequest(req: Req): RequestInfo | Promise<RequestInfo>
  extractResponse(res: Res, durationMs: number): ResponseInfo | Promise<ResponseInfo>
  extractErrors(res: Res): ErrorInfo[] | Promise<ErrorInfo[]>
}

const JSON_TYPE = /^application\/(?:[\w.+-]+\+)?json\b/i

export function isJsonContentType(contentType: string | null | undefined): boolean {
  return contentType != null && JSON_TYPE.test(contentType.trim())
}

/**
 * Turns a captured body into a payload value. JSON bodies are parsed so the
 * masking engine can see their keys. Anything else, unparseable JSON
 * included, follows the non-JSON policy: dropped, or forwarded as text.
 */
export function parseBody(
  raw: string | undefined,
  contentType: string | null | undefined,
  policy: NonJsonBodyPolicy
): JsonValue | undefined {
  if (raw === undefined || raw.length === 0) {
    return undefined
  }
  if (isJsonContentType(contentType)) {
    try {
      const parsed: JsonValue = JSON.parse(raw)
      return parsed
    } catch {
      return policy === 'raw' ? raw : undefined
    }
  }
  return policy === 'raw' ? raw : undefined
}

/** Collects header pairs into a plain map with lower-cased names. */
export function headerRecord(headers: Iterable<readonly [string, string]>): Record<string, string> {
  const record: Record<string, string> = {}
  for (const [name, value] of headers) {
    appendHeader(record, name.toLowerCase(), value)
  }
  return record
}

/**
 * Adds a header value, joining repeats with ", ". Names such as
 * `constructor` or `__proto__` are stored as own keys like any other.
 */
export function appendHeader(record: Record<string, string>, name: string, value: string): void {
  setOwn(record, name, Object.hasOwn(record, name) ? `${record[name]}, ${value}` : value)
}

function lookup(headers: Readonly<Record<string, string>>, name: string): string | undefined {
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === name) {
      return value
    }
  }
  return undefined
}

/**
 * Client address as reported by proxies: `Forwarded: for=`, then the first
 * hop of `X-Forwarded-For`, then `X-Real-IP`.
 */
export function extractIpFromHeaders(headers: Readonly<Record<string, string>>): string | undefined {
  const forwarded = lookup(headers, 'forwarded')
  if (forwarded) {
    const match = /for=("?)([^;,"]+)\1/i.exec(forwarded)
    if (match) {
      return stripPort(match[2].trim())
    }
  }

  const forwardedFor = lookup(headers, 'x-forwarded-for')?.split(',')[0]?.trim()
  if (forwardedFor) {
    return forwardedFor
  }

  const realIp = lookup(headers, 'x-real-ip')?.trim()
  return realIp || undefined
}

function stripPort(address: string): string {
  if (address.startsWith('[')) {
    const end = address.indexOf(']')
    return end === -1 ? address : address.slice(1, end)
  }
  const colons = address.split(':').length - 1
  return colons === 1 ? address.slice(0, address.indexOf(':')) : address
}

/** Error entries derived from a 4xx/5xx response. */
export function errorsFromResponse(code: number, body: JsonValue | undefined, source: string): ErrorInfo[] {
  if (code < 400) {
    return []
  }
  return [
    {
      source,
      type: `HTTP_${code}`,
      message: errorMessageFromBody(body) ?? `HTTP ${code}`,
      file: '',
      line: 0
    }
  ]
}

function errorMessageFromBody(body: JsonValue | undefined): string | undefined {
  if (typeof body === 'string') {
    return body.length > 0 ? body : undefined
  }
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return undefined
  }
  for (const field of ['message', 'error']) {
    const value = body[field]
    if (typeof value === 'string' && value.length > 0) {
      return value
    }
  }
  return undefined
}

const STACK_FRAME = /^\s*at (?:.*? \()?(.+?):(\d+):\d+\)?$/

export function errorFromException(error: unknown, source: string): ErrorInfo {
  if (!(error instanceof Error)) {
    return { source, type: 'Error', message: String(error), file: '', line: 0 }
  }

  let file = ''
  let line = 0
  for (const frame of error.stack?.split('\n').slice(1) ?? []) {
    const match = STACK_FRAME.exec(frame)
    if (match) {
      file = match[1]
      line = Number(match[2])
      break
    }
  }

  return { source, type: error.name, message: error.message, file, line }
}

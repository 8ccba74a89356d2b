import {
  errorsFromResponse,
  extractIpFromHeaders,
  isJsonContentType,
  parseBody,
  type ErrorInfo,
  type Extractor,
  type JsonValue,
  type NonJsonBodyPolicy,
  type RequestInfo,
  type ResponseInfo
} from '@treblle-node/core'
import { REQUEST_KIND, RESPONSE_KIND, type HostFunctions, type MessageKind } from './host.js'

export const SOURCE = 'sandbox'

export interface RequestCapture {
  receivedAt: Date
  /** `performance.now()` at request arrival. */
  started: number
  /** Request body as read (and written back) in the request hook. */
  body?: Uint8Array
}

/** What the request hook hands back to the response hook. */
export interface SandboxRequestContext extends RequestCapture {
  request: RequestInfo
}

export interface SandboxResponse {
  isError: boolean
  /** Present only when the host buffers responses. */
  body?: Uint8Array
  /** Parsed response body, kept for error extraction. */
  parsedBody?: JsonValue
}

const decoder = new TextDecoder()

/**
 * Pulls request and response facts out of the host through its
 * header/body/status calls.
 */
export class SandboxExtractor implements Extractor<RequestCapture, SandboxResponse> {
  constructor(private readonly host: HostFunctions, private readonly policy: NonJsonBodyPolicy) {}

  extractRequest(ctx: RequestCapture): RequestInfo {
    const headers = this.headers(REQUEST_KIND)
    const body = this.body(ctx.body, headers['content-type'])
    return {
      timestamp: ctx.receivedAt.toISOString(),
      ip: extractIpFromHeaders(headers) ?? stripPort(this.host.getSourceAddress()),
      url: absoluteUrl(this.host.getUri(), headers),
      user_agent: headers['user-agent'] ?? '',
      method: this.host.getMethod(),
      headers,
      ...(body === undefined ? {} : { body })
    }
  }

  extractResponse(res: SandboxResponse, durationMs: number): ResponseInfo {
    const headers = this.headers(RESPONSE_KIND)
    res.parsedBody = this.body(res.body, headers['content-type'])
    const size = res.body?.byteLength ?? Number(headers['content-length'] ?? 0)
    return {
      headers,
      code: this.host.getStatusCode(),
      size: Number.isFinite(size) ? size : 0,
      load_time: durationMs / 1000,
      ...(res.parsedBody === undefined ? {} : { body: res.parsedBody })
    }
  }

  extractErrors(res: SandboxResponse): ErrorInfo[] {
    const code = this.host.getStatusCode()
    const errors = errorsFromResponse(code, res.parsedBody, SOURCE)
    if (res.isError && errors.length === 0) {
      errors.push({ source: SOURCE, type: 'HostError', message: `Host flagged the response (status ${code})`, file: '', line: 0 })
    }
    return errors
  }

  private headers(kind: MessageKind): Record<string, string> {
    const headers: Record<string, string> = {}
    for (const name of this.host.getHeaderNames(kind)) {
      headers[name.toLowerCase()] = this.host.getHeaderValues(kind, name).join(', ')
    }
    return headers
  }

  private body(bytes: Uint8Array | undefined, contentType: string | undefined): JsonValue | undefined {
    if (!bytes || bytes.byteLength === 0) {
      return undefined
    }
    if (!isJsonContentType(contentType) && this.policy === 'omit') {
      return undefined
    }
    return parseBody(decoder.decode(bytes), contentType, this.policy)
  }
}

function absoluteUrl(uri: string, headers: Record<string, string>): string {
  if (/^https?:\/\//i.test(uri)) {
    return uri
  }
  const scheme = headers['x-forwarded-proto']?.split(',')[0]?.trim() || 'http'
  const host = headers['x-forwarded-host'] ?? headers.host ?? 'localhost'
  return `${scheme}://${host}${uri.startsWith('/') ? uri : `/${uri}`}`
}

function stripPort(address: string): string {
  const bracketed = /^\[([^\]]+)\](?::\d+)?$/.exec(address)
  if (bracketed) {
    return bracketed[1]
  }
  const parts = address.split(':')
  return parts.length === 2 ? parts[0] : address
}

import type { Context } from 'hono'
import {
  errorFromException,
  errorsFromResponse,
  extractIpFromHeaders,
  headerRecord,
  isJsonContentType,
  parseBody,
  type ErrorInfo,
  type Extractor,
  type JsonValue,
  type NonJsonBodyPolicy,
  type RequestInfo,
  type ResponseInfo
} from '@treblle-node/core'

export const SOURCE = 'hono'

const BODYLESS_METHODS = new Set(['GET', 'HEAD', 'OPTIONS'])

/** Response state taken when the handler chain returns. */
export interface ResponseSnapshot {
  status: number
  headers: Record<string, string>
  /** Clone to read the body from, when the body is captured at all. */
  copy?: Response
  error?: Error
}

/** One request/response pair as seen by the middleware. */
export interface HonoExchange {
  c: Context
  receivedAt: Date
  response?: ResponseSnapshot
  /** Parsed response body, kept for error extraction. */
  responseBody?: JsonValue
}

/**
 * Reads Hono requests and responses through clones, so handlers and clients
 * still get untouched bodies.
 */
export class HonoExtractor implements Extractor<HonoExchange, HonoExchange> {
  constructor(private readonly policy: NonJsonBodyPolicy) {}

  async extractRequest({ c, receivedAt }: HonoExchange): Promise<RequestInfo> {
    const headers = headerRecord(c.req.raw.headers)
    const contentType = headers['content-type']

    let body: JsonValue | undefined
    if (!BODYLESS_METHODS.has(c.req.method) && this.wantsBody(contentType)) {
      body = parseBody(await c.req.raw.clone().text(), contentType, this.policy)
    }

    return {
      timestamp: receivedAt.toISOString(),
      ip: extractIpFromHeaders(headers) ?? 'unknown',
      url: c.req.url,
      user_agent: headers['user-agent'] ?? '',
      method: c.req.method,
      headers,
      ...(body === undefined ? {} : { body })
    }
  }

  /**
   * Records the response as it leaves the handler chain. Must run before the
   * middleware returns: the clone has to exist before the client starts
   * reading the body.
   */
  snapshot(exchange: HonoExchange): ResponseSnapshot {
    const { res, error } = exchange.c
    const headers = headerRecord(res.headers)
    const snapshot: ResponseSnapshot = {
      status: res.status,
      headers,
      error,
      copy: res.body && this.wantsBody(headers['content-type']) ? res.clone() : undefined
    }
    exchange.response = snapshot
    return snapshot
  }

  /** Reads the cloned body to its end; streamed bodies finish at their own pace. */
  async extractResponse(exchange: HonoExchange, durationMs: number): Promise<ResponseInfo> {
    const { status, headers, copy } = exchange.response ?? this.snapshot(exchange)

    let size = Number(headers['content-length'] ?? 0)
    if (copy) {
      const text = await copy.text()
      size = Buffer.byteLength(text)
      exchange.responseBody = parseBody(text, headers['content-type'], this.policy)
    }

    return {
      headers,
      code: status,
      size: Number.isFinite(size) ? size : 0,
      load_time: durationMs / 1000,
      ...(exchange.responseBody === undefined ? {} : { body: exchange.responseBody })
    }
  }

  extractErrors(exchange: HonoExchange): ErrorInfo[] {
    const { status, error } = exchange.response ?? this.snapshot(exchange)
    if (error) {
      return [errorFromException(error, SOURCE)]
    }
    return errorsFromResponse(status, exchange.responseBody, SOURCE)
  }

  /** JSON always; text only when it would be forwarded, and never a stream. */
  private wantsBody(contentType: string | undefined): boolean {
    if (isJsonContentType(contentType)) {
      return true
    }
    return (
      this.policy === 'raw' &&
      contentType !== undefined &&
      contentType.startsWith('text/') &&
      !contentType.startsWith('text/event-stream')
    )
  }
}

import { TransportError } from '../errors.js'
import { appendHeader } from '../extraction.js'

export const MAX_RESPONSE_HEAD_BYTES = 16 * 1024

export interface Http1Request {
  method: string
  /** Value of the Host header, port included when not the scheme default. */
  host: string
  path: string
  headers: Record<string, string>
  body: Buffer
}

export interface ResponseHead {
  statusCode: number
  reason: string
  headers: Record<string, string>
  /** Bytes taken by the status line, headers and the blank line. */
  length: number
}

const HEADER_TERMINATOR = Buffer.from('\r\n\r\n')
const STATUS_LINE = /^HTTP\/1\.[01] (\d{3})(?: (.*))?$/
const TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/

/**
 * Serializes a request with a fixed Content-Length and `Connection: close`,
 * so the server ends the exchange once it has answered.
 */
export function serializeRequest(request: Http1Request): Buffer {
  const lines = [`${request.method} ${request.path || '/'} HTTP/1.1`, `Host: ${request.host}`]
  for (const [name, value] of Object.entries(request.headers)) {
    if (!TOKEN.test(name)) {
      throw new TransportError('InvalidHeader', `Invalid header name "${name}"`)
    }
    if (/[\r\n\0]/.test(value)) {
      throw new TransportError('InvalidHeader', `Header "${name}" contains a line break or NUL`)
    }
    lines.push(`${name}: ${value}`)
  }
  lines.push(`Content-Length: ${request.body.length}`, 'Connection: close', '', '')
  return Buffer.concat([Buffer.from(lines.join('\r\n'), 'latin1'), request.body])
}

/**
 * Parses the status line and headers at the start of `buffer`. Returns
 * undefined while the head is still incomplete.
 */
export function parseResponseHead(buffer: Buffer, maxBytes = MAX_RESPONSE_HEAD_BYTES): ResponseHead | undefined {
  const end = buffer.indexOf(HEADER_TERMINATOR)
  if (end === -1) {
    if (buffer.length > maxBytes) {
      throw new TransportError('MalformedResponse', `Response head exceeds ${maxBytes} bytes`)
    }
    return undefined
  }
  if (end > maxBytes) {
    throw new TransportError('MalformedResponse', `Response head exceeds ${maxBytes} bytes`)
  }

  const [statusLine, ...headerLines] = buffer.subarray(0, end).toString('latin1').split('\r\n')
  const status = STATUS_LINE.exec(statusLine)
  if (!status) {
    throw new TransportError('MalformedResponse', `Invalid status line "${statusLine.slice(0, 64)}"`)
  }

  const headers: Record<string, string> = {}
  for (const line of headerLines) {
    const colon = line.indexOf(':')
    if (colon <= 0) {
      throw new TransportError('MalformedResponse', 'Invalid response header line')
    }
    const name = line.slice(0, colon).trim().toLowerCase()
    const value = line.slice(colon + 1).trim()
    appendHeader(headers, name, value)
  }

  return {
    statusCode: Number(status[1]),
    reason: status[2] ?? '',
    headers,
    length: end + HEADER_TERMINATOR.length
  }
}

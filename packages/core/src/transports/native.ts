import { Agent, request } from 'undici'
import { HEADER_API_KEY, HEADER_CONTENT_TYPE, JSON_CONTENT_TYPE } from '../constants.js'
import { TransportError, errorMessage } from '../errors.js'
import type { Logger } from '../logger.js'
import { errorCode, isCertificateErrorCode, loadRootCertificates } from './certs.js'
import type { SendRequest, Transport } from './types.js'

export interface NativeTransportOptions {
  timeoutMs: number
  /** PEM file of extra trust anchors. Node's bundled roots otherwise. */
  rootCaPath?: string
  /** How long an idle pooled connection is kept open. */
  keepAliveTimeoutMs?: number
  logger?: Logger
}

const TIMEOUT_CODES = new Set([
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_ABORTED',
  'ABORT_ERR'
])

/**
 * Sends over a pooled undici Agent. Connections are kept alive and reused
 * across payloads; certificate verification is always on.
 */
export class NativeTransport implements Transport {
  readonly regime = 'native' as const
  private agent?: Promise<Agent>

  constructor(private readonly options: NativeTransportOptions) {}

  async send({ baseUrl, body, apiKey }: SendRequest): Promise<number> {
    let url: URL
    try {
      url = new URL(baseUrl)
    } catch (err) {
      throw new TransportError('InvalidUrl', `Invalid URL "${baseUrl}"`, { cause: err })
    }
    if (url.protocol !== 'https:' && url.protocol !== 'http:') {
      throw new TransportError('InvalidUrl', `Unsupported protocol "${url.protocol}"`)
    }

    const { timeoutMs } = this.options
    try {
      const response = await request(url, {
        method: 'POST',
        headers: {
          [HEADER_CONTENT_TYPE]: JSON_CONTENT_TYPE,
          [HEADER_API_KEY]: apiKey
        },
        body,
        dispatcher: await this.getAgent(),
        headersTimeout: timeoutMs,
        bodyTimeout: timeoutMs,
        signal: AbortSignal.timeout(timeoutMs)
      })
      await response.body.dump()
      return response.statusCode
    } catch (err) {
      throw toTransportError(err, url.host, timeoutMs)
    }
  }

  async close(): Promise<void> {
    const agent = this.agent
    this.agent = undefined
    if (agent) {
      await (await agent).close()
    }
  }

  private getAgent(): Promise<Agent> {
    this.agent ??= this.createAgent()
    return this.agent
  }

  private async createAgent(): Promise<Agent> {
    const { timeoutMs, rootCaPath, keepAliveTimeoutMs = 30_000, logger } = this.options
    const ca = rootCaPath ? await loadRootCertificates(rootCaPath, logger) : undefined
    return new Agent({
      keepAliveTimeout: keepAliveTimeoutMs,
      connect: {
        timeout: timeoutMs,
        rejectUnauthorized: true,
        ...(ca ? { ca } : {})
      }
    })
  }
}

function toTransportError(error: unknown, host: string, timeoutMs: number): TransportError {
  if (error instanceof TransportError) {
    return error
  }
  const code = errorCode(error)
  if (isCertificateErrorCode(code)) {
    return new TransportError('TlsValidation', `Certificate rejected for ${host}: ${errorMessage(error)}`, {
      cause: error
    })
  }
  const name = error instanceof Error ? error.name : ''
  if ((code !== undefined && TIMEOUT_CODES.has(code)) || name === 'TimeoutError' || name === 'AbortError') {
    return new TransportError('Timeout', `No response from ${host} within ${timeoutMs}ms`, { cause: error })
  }
  return new TransportError('ConnectFailed', `Request to ${host} failed: ${errorMessage(error)}`, {
    cause: error
  })
}

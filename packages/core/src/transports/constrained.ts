import { once } from 'node:events'
import { lookup } from 'node:dns/promises'
import net from 'node:net'
import type { Duplex } from 'node:stream'
import tls from 'node:tls'
import { HEADER_CONTENT_TYPE, JSON_CONTENT_TYPE } from '../constants.js'
import { TransportError, errorMessage } from '../errors.js'
import type { Logger } from '../logger.js'
import { errorCode, isCertificateErrorCode, loadRootCertificates } from './certs.js'
import { MAX_RESPONSE_HEAD_BYTES, parseResponseHead, serializeRequest, type ResponseHead } from './http1.js'
import type { SendRequest, Transport } from './types.js'

/**
 * The little a sandbox host has to offer: name resolution and a plain TCP
 * stream. Everything above it (TLS, HTTP/1.1) is done here.
 */
export interface SocketPrimitives {
  resolve(host: string): Promise<string>
  connect(address: string, port: number, signal: AbortSignal): Promise<Duplex>
}

export const nodeSocketPrimitives: SocketPrimitives = {
  async resolve(host) {
    if (net.isIP(host) !== 0) {
      return host
    }
    const { address } = await lookup(host)
    return address
  },

  async connect(address, port, signal) {
    const socket = net.connect({ host: address, port })
    try {
      await once(socket, 'connect', { signal })
    } catch (err) {
      socket.destroy()
      throw err
    }
    return socket
  }
}

export interface ConstrainedTransportOptions {
  /** Hard deadline for the whole exchange, from resolution to response head. */
  timeoutMs: number
  rootCaPath?: string
  sockets?: SocketPrimitives
  maxResponseHeadBytes?: number
  logger?: Logger
}

/**
 * One-shot HTTPS client over raw socket primitives: resolve, connect, TLS
 * handshake against a fixed set of trust anchors, a single HTTP/1.1 POST with
 * `Connection: close`, and the response status. Nothing is written before the
 * peer certificate is verified, and plaintext URLs are refused.
 */
export class ConstrainedTransport implements Transport {
  readonly regime = 'constrained' as const
  private readonly sockets: SocketPrimitives
  private trustAnchors?: Promise<string[]>

  constructor(private readonly options: ConstrainedTransportOptions) {
    this.sockets = options.sockets ?? nodeSocketPrimitives
  }

  async send(request: SendRequest): Promise<number> {
    const url = parseHttpsUrl(request.baseUrl)
    const controller = new AbortController()
    const timer = setTimeout(() => {
      controller.abort(
        new TransportError('Timeout', `No response from ${url.host} within ${this.options.timeoutMs}ms`)
      )
    }, this.options.timeoutMs)
    const open: Duplex[] = []

    try {
      const head = await untilAborted(this.exchange(url, request, controller.signal, open), controller.signal)
      return head.statusCode
    } catch (err) {
      throw toTransportError(err, url.host, controller.signal)
    } finally {
      clearTimeout(timer)
      for (const socket of open) {
        socket.destroy()
      }
    }
  }

  async close(): Promise<void> {
    // Every exchange owns its sockets; nothing is pooled.
  }

  private async exchange(url: URL, request: SendRequest, signal: AbortSignal, open: Duplex[]): Promise<ResponseHead> {
    const host = url.hostname.replace(/^\[(.*)\]$/, '$1')
    const port = url.port ? Number(url.port) : 443

    const address = await this.sockets.resolve(host)
    signal.throwIfAborted()
    const raw = this.track(await this.sockets.connect(address, port, signal), signal, open)
    const ca = await this.getTrustAnchors()
    signal.throwIfAborted()

    const secure = tls.connect({
      socket: raw,
      host,
      servername: net.isIP(host) === 0 ? host : undefined,
      ca,
      ALPNProtocols: ['http/1.1'],
      rejectUnauthorized: true
    })
    this.track(secure, signal, open)

    await once(secure, 'secureConnect', { signal })
    if (!secure.authorized) {
      throw new TransportError(
        'TlsValidation',
        `Certificate rejected for ${url.host}: ${secure.authorizationError?.message ?? 'unauthorized'}`
      )
    }

    const payload = serializeRequest({
      method: 'POST',
      host: url.host,
      path: `${url.pathname}${url.search}`,
      headers: {
        [HEADER_CONTENT_TYPE]: JSON_CONTENT_TYPE,
        'X-Api-Key': request.apiKey
      },
      body: Buffer.from(request.body, 'utf8')
    })
    await write(secure, payload)

    return readResponseHead(secure, this.options.maxResponseHeadBytes ?? MAX_RESPONSE_HEAD_BYTES)
  }

  /**
   * Registers a socket for teardown. Sockets that show up after the deadline
   * are destroyed on arrival. Errors are logged here and surface to the
   * exchange through whichever step is waiting on the socket.
   */
  private track<S extends Duplex>(socket: S, signal: AbortSignal, open: Duplex[]): S {
    socket.on('error', err => {
      this.options.logger?.debug({ err }, 'Telemetry socket error')
    })
    if (signal.aborted) {
      socket.destroy()
      signal.throwIfAborted()
    }
    open.push(socket)
    return socket
  }

  private getTrustAnchors(): Promise<string[]> {
    this.trustAnchors ??= loadRootCertificates(this.options.rootCaPath, this.options.logger)
    return this.trustAnchors
  }
}

function parseHttpsUrl(value: string): URL {
  let url: URL
  try {
    url = new URL(value)
  } catch (err) {
    throw new TransportError('InvalidUrl', `Invalid URL "${value}"`, { cause: err })
  }
  if (url.protocol !== 'https:') {
    throw new TransportError('InvalidUrl', `Only https URLs are supported, got "${url.protocol}"`)
  }
  return url
}

function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  let onAbort: (() => void) | undefined
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(signal.reason)
    signal.addEventListener('abort', onAbort, { once: true })
  })
  return Promise.race([work, aborted]).finally(() => {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort)
    }
  })
}

function write(socket: Duplex, chunk: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.write(chunk, err => (err ? reject(err) : resolve()))
  })
}

function readResponseHead(socket: Duplex, maxBytes: number): Promise<ResponseHead> {
  return new Promise((resolve, reject) => {
    let buffered = Buffer.alloc(0)

    const cleanup = () => {
      socket.off('data', onData)
      socket.off('end', onEnd)
      socket.off('error', onError)
    }
    const onData = (chunk: Buffer) => {
      buffered = Buffer.concat([buffered, chunk])
      try {
        const head = parseResponseHead(buffered, maxBytes)
        if (head) {
          cleanup()
          resolve(head)
        }
      } catch (err) {
        cleanup()
        reject(err)
      }
    }
    const onEnd = () => {
      cleanup()
      reject(new TransportError('MalformedResponse', 'Connection closed before the response head'))
    }
    const onError = (err: Error) => {
      cleanup()
      reject(err)
    }

    socket.on('data', onData)
    socket.on('end', onEnd)
    socket.on('error', onError)
  })
}

function toTransportError(error: unknown, host: string, signal: AbortSignal): TransportError {
  if (error instanceof TransportError) {
    return error
  }
  if (signal.aborted) {
    const reason: unknown = signal.reason
    return reason instanceof TransportError ? reason : new TransportError('Timeout', `Timed out talking to ${host}`)
  }
  if (isCertificateErrorCode(errorCode(error))) {
    return new TransportError('TlsValidation', `Certificate rejected for ${host}: ${errorMessage(error)}`, {
      cause: error
    })
  }
  return new TransportError('ConnectFailed', `Connection to ${host} failed: ${errorMessage(error)}`, {
    cause: error
  })
}

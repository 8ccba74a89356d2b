import type { SocketPrimitives } from '@treblle-node/core'

export const REQUEST_KIND = 0
export const RESPONSE_KIND = 1
export type MessageKind = typeof REQUEST_KIND | typeof RESPONSE_KIND

/** Feature bits understood by `enableFeatures`. */
export const Feature = {
  BufferRequest: 1,
  BufferResponse: 2,
  Trailers: 4
} as const

/** Log levels of the host's log sink. */
export const HostLogLevel = {
  Debug: -1,
  Info: 0,
  Warn: 1,
  Error: 2,
  None: 3
} as const

export type HostLogLevelValue = (typeof HostLogLevel)[keyof typeof HostLogLevel]

/**
 * Calls the proxy host makes available to a plugin. Everything is
 * synchronous and scoped to the request currently being handled.
 */
export interface HostFunctions {
  log(level: HostLogLevelValue, message: string): void
  /** Returns the feature bits actually enabled. */
  enableFeatures(features: number): number
  /** Plugin configuration as a JSON document. */
  getConfig(): string
  getMethod(): string
  /** Request target: path and query, or an absolute URL. */
  getUri(): string
  getProtocolVersion(): string
  getHeaderNames(kind: MessageKind): string[]
  getHeaderValues(kind: MessageKind, name: string): string[]
  readBody(kind: MessageKind): Uint8Array
  writeBody(kind: MessageKind, body: Uint8Array): void
  getStatusCode(): number
  /** Peer address, possibly with a port. */
  getSourceAddress(): string
  /** Outbound sockets, when the host grants them. Node's otherwise. */
  sockets?: SocketPrimitives
}

/**
 * `native` transports run detached from the request that produced the
 * payload; `constrained` ones are awaited inline by hosts that cannot keep
 * work alive after a hook returns.
 */
export type TransportRegime = 'native' | 'constrained'

export interface SendRequest {
  /** Base URL of the monitoring endpoint; the payload is POSTed to it. */
  baseUrl: string
  /** Serialized payload. */
  body: string
  apiKey: string
}

export interface Transport {
  readonly regime: TransportRegime
  /**
   * Delivers one payload and resolves with the response status code,
   * whatever it is. Rejects with a TransportError.
   */
  send(request: SendRequest): Promise<number>
  close(): Promise<void>
}

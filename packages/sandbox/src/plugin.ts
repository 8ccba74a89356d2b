import {
  ConstrainedTransport,
  TelemetryObserver,
  pathOf,
  type Config,
  type DispatchOutcome,
  type Logger,
  type SocketPrimitives
} from '@treblle-node/core'
import { parseSandboxConfig } from './config.js'
import { SOURCE, SandboxExtractor, type RequestCapture, type SandboxRequestContext, type SandboxResponse } from './extractor.js'
import { Feature, REQUEST_KIND, RESPONSE_KIND, type HostFunctions } from './host.js'
import { createHostLogger } from './logger.js'

export interface SandboxPluginOptions {
  /** Overrides the host's sockets, if any. */
  sockets?: SocketPrimitives
}

/**
 * Edge-proxy plugin. The host calls `handleRequest` and `handleResponse`
 * once per phase; neither ever throws back into the host, and the send runs
 * inside the response hook, bounded by the configured timeout.
 */
export class SandboxPlugin {
  readonly config: Config
  readonly observer: TelemetryObserver
  readonly bufferResponse: boolean
  private readonly logger: Logger
  private readonly extractor: SandboxExtractor

  private constructor(private readonly host: HostFunctions, options: SandboxPluginOptions) {
    const settings = parseSandboxConfig(host.getConfig())
    this.config = settings.config
    this.logger = createHostLogger(host, settings.logLevel)

    this.bufferResponse = false
    if (settings.bufferResponse) {
      const enabled = host.enableFeatures(Feature.BufferResponse)
      this.bufferResponse = (enabled & Feature.BufferResponse) !== 0
      this.logger.debug({ features: enabled }, 'Enabled host features')
    }

    const transport = new ConstrainedTransport({
      timeoutMs: this.config.timeoutMs,
      rootCaPath: this.config.rootCaPath,
      sockets: options.sockets ?? host.sockets,
      logger: this.logger
    })
    this.observer = new TelemetryObserver(this.config, {
      transport,
      logger: this.logger,
      server: { software: 'edge-proxy' }
    })
    this.extractor = new SandboxExtractor(host, this.config.nonJsonBodyPolicy)
  }

  /** Reads the plugin configuration from the host. Throws ConfigError when it is invalid. */
  static init(host: HostFunctions, options: SandboxPluginOptions = {}): SandboxPlugin {
    return new SandboxPlugin(host, options)
  }

  /**
   * Request hook. Returns the context the response hook needs, or undefined
   * when the request is not observed. The request body is written back
   * untouched.
   */
  handleRequest(): SandboxRequestContext | undefined {
    try {
      if (this.observer.isIgnored(pathOf(this.host.getUri()))) {
        return undefined
      }
      const capture: RequestCapture = { receivedAt: new Date(), started: performance.now() }
      capture.body = this.host.readBody(REQUEST_KIND)
      this.host.writeBody(REQUEST_KIND, capture.body)
      return { ...capture, request: this.extractor.extractRequest(capture) }
    } catch (err) {
      this.observer.dispatcher.recordDropped()
      this.logger.error({ err }, 'Failed to process request')
      return undefined
    }
  }

  /** Response hook. Extracts, builds and sends before returning. */
  async handleResponse(ctx: SandboxRequestContext | undefined, isError: boolean): Promise<DispatchOutcome | undefined> {
    if (!ctx) {
      return undefined
    }
    try {
      const response: SandboxResponse = { isError, body: this.bufferResponse ? this.readResponseBody() : undefined }
      const info = this.extractor.extractResponse(response, performance.now() - ctx.started)
      const errors = this.extractor.extractErrors(response)
      return await this.observer.observe({ request: ctx.request, response: info, errors })
    } catch (err) {
      this.observer.dispatcher.recordDropped()
      this.logger.error({ err, source: SOURCE }, 'Failed to process response')
      return undefined
    }
  }

  close(): Promise<void> {
    return this.observer.close()
  }

  private readResponseBody(): Uint8Array {
    const body = this.host.readBody(RESPONSE_KIND)
    this.host.writeBody(RESPONSE_KIND, body)
    return body
  }
}

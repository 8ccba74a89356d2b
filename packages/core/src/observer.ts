import type { Config } from './config.js'
import { Dispatcher, type DispatchAttempt, type DispatchOutcome, type DispatcherStats } from './dispatcher.js'
import type { EnvironmentFacts } from './environment.js'
import { BuildError } from './errors.js'
import { createLogger, type Logger } from './logger.js'
import { PayloadBuilder, type Observation } from './payload.js'
import type { ServerInfo } from './schema.js'
import { NativeTransport } from './transports/native.js'
import type { Transport } from './transports/types.js'

export interface TelemetryObserverOptions {
  /** Defaults to a native transport built from the config. */
  transport?: Transport
  logger?: Logger
  /** Merged over the detected server facts. */
  server?: Partial<ServerInfo>
  environment?: EnvironmentFacts
}

/**
 * Entry point for host adapters: blacklist check, then build and dispatch.
 * Nothing here throws or rejects into the host's request path.
 */
export class TelemetryObserver {
  readonly builder: PayloadBuilder
  readonly dispatcher: Dispatcher
  private readonly logger: Logger

  constructor(readonly config: Config, options: TelemetryObserverOptions = {}) {
    this.logger = options.logger ?? createLogger({ name: 'treblle' })
    const transport =
      options.transport ??
      new NativeTransport({ timeoutMs: config.timeoutMs, rootCaPath: config.rootCaPath, logger: this.logger })
    this.builder = new PayloadBuilder(config, { server: options.server, environment: options.environment })
    this.dispatcher = new Dispatcher(config, transport, { logger: this.logger })
  }

  /** True when the path is blacklisted; the observation is counted as ignored. */
  isIgnored(path: string): boolean {
    const ignored = this.config.isIgnored(path)
    if (ignored) {
      this.dispatcher.recordIgnored()
    }
    return ignored
  }

  /**
   * Builds and dispatches one observation. Resolves once the send is
   * scheduled, or, for an inline transport, once it has finished. Resolves
   * with undefined when the observation was dropped or sent detached.
   */
  async observe(observation: Observation): Promise<DispatchOutcome | undefined> {
    let attempt: DispatchAttempt
    try {
      attempt = this.dispatcher.dispatch(this.builder.build(observation))
    } catch (err) {
      this.dispatcher.recordDropped()
      if (err instanceof BuildError) {
        this.logger.warn({ missing: err.missing }, 'Dropping incomplete observation')
      } else {
        this.logger.error({ err }, 'Failed to build telemetry payload')
      }
      return undefined
    }
    return this.dispatcher.inline ? attempt.done : undefined
  }

  stats(): DispatcherStats {
    return this.dispatcher.stats()
  }

  flush(): Promise<void> {
    return this.dispatcher.flush()
  }

  close(): Promise<void> {
    return this.dispatcher.close()
  }
}

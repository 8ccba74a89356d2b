import type { MiddlewareHandler } from 'hono'
import {
  TelemetryObserver,
  createLogger,
  loadConfigFromEnv,
  type Config,
  type Logger,
  type RequestInfo,
  type Transport
} from '@treblle-node/core'
import { HonoExtractor, SOURCE, type HonoExchange } from './extractor.js'

export interface TreblleOptions {
  /** Read from the environment when omitted. */
  config?: Config
  /** Native transport built from the config when omitted. */
  transport?: Transport
  logger?: Logger
}

export type TreblleMiddleware = MiddlewareHandler & {
  readonly observer: TelemetryObserver
  /** Waits for response captures still reading their body, then for their sends. */
  flush(): Promise<void>
  close(): Promise<void>
}

/**
 * Observes every request that is not blacklisted and ships it to the
 * monitoring API after the response is produced. The response body is read
 * from a clone in the background, so a streamed body reaches the client as it
 * is produced. Telemetry failures are logged and never change what the
 * client receives.
 */
export function treblle(options: TreblleOptions = {}): TreblleMiddleware {
  const config = options.config ?? loadConfigFromEnv()
  const logger = options.logger ?? createLogger({ name: 'treblle-hono' })
  const observer = new TelemetryObserver(config, {
    transport: options.transport,
    logger,
    server: { software: SOURCE }
  })
  const extractor = new HonoExtractor(config.nonJsonBodyPolicy)
  const captures = new Set<Promise<void>>()

  const capture = async (exchange: HonoExchange, request: RequestInfo, durationMs: number): Promise<void> => {
    try {
      const response = await extractor.extractResponse(exchange, durationMs)
      const errors = extractor.extractErrors(exchange)
      await observer.observe({ request, response, errors })
    } catch (err) {
      observer.dispatcher.recordDropped()
      logger.warn({ err, path: exchange.c.req.path }, 'Failed to extract response')
    }
  }

  const handler: MiddlewareHandler = async (c, next) => {
    if (observer.isIgnored(c.req.path)) {
      await next()
      return
    }

    const exchange: HonoExchange = { c, receivedAt: new Date() }
    const started = performance.now()

    let request: RequestInfo | undefined
    try {
      request = await extractor.extractRequest(exchange)
    } catch (err) {
      observer.dispatcher.recordDropped()
      logger.warn({ err, path: c.req.path }, 'Failed to extract request')
    }

    await next()

    if (!request) {
      return
    }
    const durationMs = performance.now() - started

    try {
      extractor.snapshot(exchange)
    } catch (err) {
      observer.dispatcher.recordDropped()
      logger.warn({ err, path: c.req.path }, 'Failed to capture response')
      return
    }

    const task = capture(exchange, request, durationMs)
    captures.add(task)
    void task.finally(() => captures.delete(task))
  }

  const flush = async (): Promise<void> => {
    await Promise.all(captures)
    await observer.flush()
  }

  const close = async (): Promise<void> => {
    await Promise.all(captures)
    await observer.close()
  }

  return Object.assign(handler, { observer, flush, close })
}

import { v4 as uuidv4 } from 'uuid'
import type { Config } from './config.js'
import { TransportError, errorMessage } from './errors.js'
import { createLogger, type Logger } from './logger.js'
import type { TrebllePayload } from './schema.js'
import type { Transport } from './transports/types.js'

export type DispatchState = 'Idle' | 'Sending' | 'Sent' | 'Failed'

export interface DispatchOutcome {
  id: string
  state: 'Sent' | 'Failed'
  endpoint?: string
  statusCode?: number
  /** A TransportError, or the serialization failure. */
  error?: Error
}

export interface DispatcherStats {
  sent: number
  failed: number
  /** Observations discarded before a send was attempted. */
  dropped: number
  /** Requests skipped by the route blacklist. */
  ignored: number
  inFlight: number
}

const TRANSITIONS: Record<DispatchState, readonly DispatchState[]> = {
  Idle: ['Sending', 'Failed'],
  Sending: ['Sent', 'Failed'],
  Sent: [],
  Failed: []
}

/** Lifecycle of a single observation's delivery. Terminal states are final. */
export class DispatchAttempt {
  readonly id = uuidv4()
  readonly done: Promise<DispatchOutcome>
  private current: DispatchState = 'Idle'
  private readonly settle: (outcome: DispatchOutcome) => void

  constructor() {
    let settle: (outcome: DispatchOutcome) => void = () => undefined
    this.done = new Promise(resolve => {
      settle = resolve
    })
    this.settle = settle
  }

  get state(): DispatchState {
    return this.current
  }

  /** @internal */
  transition(next: DispatchState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Invalid dispatch transition ${this.current} -> ${next}`)
    }
    this.current = next
  }

  /** @internal */
  finish(outcome: Omit<DispatchOutcome, 'id' | 'state'>, state: 'Sent' | 'Failed'): void {
    this.transition(state)
    this.settle({ id: this.id, state, ...outcome })
  }
}

export interface DispatcherOptions {
  logger?: Logger
}

/**
 * Hands payloads to the transport, one attempt each, no retries. Never
 * rejects: every failure ends as a `Failed` attempt, a log line and a counter
 * bump.
 *
 * With a native transport the send runs detached and `dispatch` returns at
 * once. A constrained transport is expected to be awaited inline through
 * `attempt.done`, which settles within `timeoutMs`.
 */
export class Dispatcher {
  readonly inline: boolean
  private readonly logger: Logger
  private readonly pending = new Set<Promise<DispatchOutcome>>()
  private readonly counters = { sent: 0, failed: 0, dropped: 0, ignored: 0, inFlight: 0 }
  private nextEndpoint = 0
  private closed = false

  constructor(
    private readonly config: Config,
    private readonly transport: Transport,
    options: DispatcherOptions = {}
  ) {
    this.inline = transport.regime === 'constrained'
    this.logger = options.logger ?? createLogger({ name: 'treblle-dispatcher' })
  }

  dispatch(payload: TrebllePayload): DispatchAttempt {
    const attempt = new DispatchAttempt()

    if (this.closed) {
      this.counters.dropped++
      attempt.finish({ error: new TransportError('Closed', 'Dispatcher is closed, payload dropped') }, 'Failed')
      return attempt
    }

    let body: string
    try {
      body = JSON.stringify(payload)
    } catch (err) {
      this.counters.failed++
      this.logger.warn({ err, attemptId: attempt.id }, 'Failed to serialize telemetry payload')
      attempt.finish({ error: err instanceof Error ? err : new Error(errorMessage(err)) }, 'Failed')
      return attempt
    }

    const endpoint = this.selectEndpoint()
    attempt.transition('Sending')
    this.counters.inFlight++
    const run = this.send(attempt, endpoint, body, payload.api_key)
    this.pending.add(run)
    void run.finally(() => this.pending.delete(run))
    return attempt
  }

  recordIgnored(): void {
    this.counters.ignored++
  }

  recordDropped(): void {
    this.counters.dropped++
  }

  stats(): DispatcherStats {
    return { ...this.counters }
  }

  /** Waits for every send started so far. */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending])
    }
  }

  /** Stops accepting payloads, drains within the timeout, closes the transport. */
  async close(): Promise<void> {
    if (this.closed) {
      return
    }
    this.closed = true
    await deadline(this.flush(), this.config.timeoutMs).catch((err: unknown) => {
      this.logger.warn({ err, inFlight: this.counters.inFlight }, 'Telemetry sends still in flight at close')
    })
    await this.transport.close()
  }

  private selectEndpoint(): string {
    const urls = this.config.apiUrls
    if (this.config.endpointStrategy === 'primary') {
      return urls[0]
    }
    const url = urls[this.nextEndpoint % urls.length]
    this.nextEndpoint = (this.nextEndpoint + 1) % urls.length
    return url
  }

  private async send(attempt: DispatchAttempt, endpoint: string, body: string, apiKey: string): Promise<DispatchOutcome> {
    try {
      const statusCode = await deadline(this.transport.send({ baseUrl: endpoint, body, apiKey }), this.config.timeoutMs)
      if (statusCode < 200 || statusCode > 299) {
        throw new TransportError('NonSuccessStatus', `Telemetry endpoint answered ${statusCode}`, { statusCode })
      }
      this.counters.inFlight--
      this.counters.sent++
      this.logger.debug({ attemptId: attempt.id, endpoint, statusCode }, 'Telemetry payload sent')
      attempt.finish({ endpoint, statusCode }, 'Sent')
    } catch (err) {
      const error =
        err instanceof TransportError
          ? err
          : new TransportError('ConnectFailed', errorMessage(err), { cause: err })
      this.counters.inFlight--
      this.counters.failed++
      this.logger.warn({ err: error, kind: error.kind, attemptId: attempt.id, endpoint }, 'Telemetry send failed')
      attempt.finish({ endpoint, statusCode: error.statusCode, error }, 'Failed')
    }
    return attempt.done
  }
}

function deadline<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TransportError('Timeout', `Gave up after ${timeoutMs}ms`))
    }, timeoutMs)
  })
  return Promise.race([work, expired]).finally(() => clearTimeout(timer))
}

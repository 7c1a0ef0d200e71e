import { readEnvConfig } from '../core/config.ts'
import { logger as defaultLogger, type TLogger } from '../core/logger.ts'
import type { TMetricsTransport } from '../core/types.ts'
import { validateMetricName, validateMetricValue } from '../core/utils.ts'
import { AggregationBuffer } from '../domains/aggregation/aggregation.feature.ts'
import type { TBufferConfig, TFlushReport } from '../domains/aggregation/types.ts'
import {
  createAbsolute,
  createGauge,
  createIncrement,
  createTiming,
  createTotal,
} from '../domains/events/events.ts'

export type TBufferedMetricsClientOptions = {
  /** Receives one merged event per metric name on every flush */
  transport: TMetricsTransport
  /** Prepended to every metric name, e.g. `api.` (default: METRICS_PREFIX or none) */
  prefix?: string
  /** Overrides environment settings, which override {@link DEFAULT_BUFFER_CONFIG} */
  config?: Partial<TBufferConfig>
  logger?: TLogger
}

/**
 * Public surface for submitting metrics. Every call only queues an event; merging and
 * delivery happen in the aggregation loop.
 *
 * @example
 * ```typescript
 * const metrics = new BufferedMetricsClient({
 *   transport: new HttpMetricsTransport({ baseUrl: 'https://metrics.example.com' }),
 *   prefix: 'checkout.',
 * })
 *
 * await metrics.increment('orders')
 * await metrics.gauge('queue-depth', 12)
 * const receipt = await metrics.time('payment', () => charge(order))
 *
 * await metrics.close()
 * ```
 */
export class BufferedMetricsClient {
  private readonly buffer: AggregationBuffer
  private readonly prefix: string
  private readonly logger: TLogger

  constructor(options: TBufferedMetricsClientOptions) {
    const { prefix: envPrefix, ...envConfig } = readEnvConfig()
    this.prefix = options.prefix ?? envPrefix ?? ''
    this.logger = options.logger ?? defaultLogger
    this.buffer = new AggregationBuffer({
      transport: options.transport,
      config: { ...envConfig, ...options.config },
      logger: this.logger,
    })
  }

  /** Settles when the aggregation loop exits; rejects if it stopped on a fault. */
  public get done(): Promise<void> {
    return this.buffer.done
  }

  /** Adds `delta` to a counter. A zero delta is ignored. */
  public async increment(name: string, delta = 1): Promise<void> {
    validateMetricName(name)
    validateMetricValue(name, delta)
    if (delta === 0) return
    await this.buffer.submit(createIncrement(this.qualify(name), delta))
  }

  /** Subtracts `delta` from a counter. A zero delta is ignored. */
  public async decrement(name: string, delta = 1): Promise<void> {
    validateMetricName(name)
    validateMetricValue(name, delta)
    if (delta === 0) return
    await this.buffer.submit(createIncrement(this.qualify(name), -delta))
  }

  /** Records one duration sample in milliseconds. */
  public async timing(name: string, durationMs: number): Promise<void> {
    validateMetricName(name)
    validateMetricValue(name, durationMs)
    await this.buffer.submit(createTiming(this.qualify(name), durationMs))
  }

  /** Sets a gauge. Zero is a reading like any other and is always sent. */
  public async gauge(name: string, value: number): Promise<void> {
    validateMetricName(name)
    validateMetricValue(name, value)
    await this.buffer.submit(createGauge(this.qualify(name), value))
  }

  /** Reports an absolute value that the backend must not average. */
  public async absolute(name: string, value: number): Promise<void> {
    validateMetricName(name)
    validateMetricValue(name, value)
    await this.buffer.submit(createAbsolute(this.qualify(name), value))
  }

  /** Reports a continuously increasing total, e.g. reads since boot. */
  public async total(name: string, value: number): Promise<void> {
    validateMetricName(name)
    validateMetricValue(name, value)
    await this.buffer.submit(createTotal(this.qualify(name), value))
  }

  /**
   * Runs `work` and records how long it took as a timing, whether it resolved or threw.
   * Returns (or rethrows) the outcome of `work`.
   */
  public async time<T>(name: string, work: () => Promise<T> | T): Promise<T> {
    validateMetricName(name)
    const startedAt = performance.now()
    try {
      return await work()
    } finally {
      const elapsed = performance.now() - startedAt
      await this.timing(name, elapsed).catch((error: unknown) => {
        this.logger.warn(`Could not record timing for "${name}":`, error)
      })
    }
  }

  /** Sends everything merged so far without waiting for the next interval. */
  public flush(): Promise<TFlushReport> {
    return this.buffer.flush()
  }

  /** Flushes pending metrics, stops the loop and closes the transport. */
  public close(): Promise<void> {
    return this.buffer.close()
  }

  private qualify(name: string): string {
    return this.prefix + name
  }
}

import { resolveBufferConfig } from '../../core/config.ts'
import { BufferClosedError, CloseError, TimeoutError } from '../../core/errors.ts'
import { logger as defaultLogger, type TLogger } from '../../core/logger.ts'
import { Mailbox } from '../../core/mailbox.ts'
import type { TMetricsTransport } from '../../core/types.ts'
import { toError, withTimeout } from '../../core/utils.ts'
import { cloneEvent, eventKey, mergeEvent } from '../events/events.ts'
import type { TMetricEvent } from '../events/types.ts'
import type { TBufferConfig, TBufferState, TFlushReport, TLoopMessage } from './types.ts'

export type TAggregationBufferOptions = {
  transport: TMetricsTransport
  config?: Partial<TBufferConfig>
  logger?: TLogger
}

/**
 * Merges submitted events per key and hands one merged event per key to the transport on
 * every flush interval.
 *
 * All input (events, timer ticks, flush and close requests) goes through one mailbox that a
 * single loop drains, so the event map is only ever touched from inside that loop and needs
 * no locking. A close request is queued behind every event submitted before it.
 */
export class AggregationBuffer {
  /** Resolves when close() stops the loop; rejects with the fault if the loop fails. */
  public readonly done: Promise<void>

  private readonly events: Map<string, TMetricEvent> = new Map()
  private readonly mailbox: Mailbox<TLoopMessage>
  private readonly transport: TMetricsTransport
  private readonly config: TBufferConfig
  private readonly logger: TLogger
  private flushTimer: ReturnType<typeof setInterval> | null = null
  private closePromise: Promise<void> | null = null
  private tickPending = false
  private loopState: TBufferState = 'running'

  constructor(options: TAggregationBufferOptions) {
    this.transport = options.transport
    this.config = resolveBufferConfig(options.config)
    this.logger = options.logger ?? defaultLogger
    this.mailbox = new Mailbox<TLoopMessage>({ capacity: this.config.queueCapacity })

    this.startFlushTimer()
    this.done = this.run()
  }

  public get state(): TBufferState {
    return this.loopState
  }

  /**
   * Queues a copy of the event for merging, so the caller may reuse or change its object.
   * Waits only while the queue is at capacity.
   */
  public submit(event: TMetricEvent): Promise<void> {
    return this.mailbox.send({ type: 'event', event: cloneEvent(event) })
  }

  /** Flushes everything merged so far, after every event submitted before this call. */
  public flush(): Promise<TFlushReport> {
    return new Promise<TFlushReport>((resolve, reject) => {
      this.mailbox.send({ type: 'flush', resolve, reject }).catch(reject)
    })
  }

  /**
   * Drains the queue, performs a final flush, then closes the transport.
   * Safe to call more than once; later calls share the first call's outcome.
   * When `closeTimeoutMs` elapses first, rejects with TimeoutError and closes the transport
   * after the final flush finishes.
   */
  public close(): Promise<void> {
    if (!this.closePromise) this.closePromise = this.doClose()
    return this.closePromise
  }

  private async doClose(): Promise<void> {
    let flushError: Error | null = null
    try {
      const report = await this.requestShutdown()
      flushError = report.error
    } catch (error) {
      flushError = toError(error)
    }

    // The transport is closed only once the loop has stopped sending through it.
    if (flushError instanceof TimeoutError) {
      this.closeTransportWhenSettled().catch((error: unknown) => {
        this.logger.error('Deferred transport close failed:', error)
      })
      throw flushError
    }

    await this.loopSettled()
    const transportError = await this.closeTransport()

    if (flushError && transportError) throw new CloseError(flushError, transportError)
    if (flushError) throw flushError
    if (transportError) throw transportError
  }

  private async closeTransportWhenSettled(): Promise<void> {
    await this.loopSettled()
    const transportError = await this.closeTransport()
    if (transportError) throw transportError
  }

  private loopSettled(): Promise<void> {
    return this.done.then(
      () => undefined,
      () => undefined,
    )
  }

  private async closeTransport(): Promise<Error | null> {
    try {
      await this.transport.close()
      return null
    } catch (error) {
      return toError(error)
    }
  }

  private requestShutdown(): Promise<TFlushReport> {
    const reply = new Promise<TFlushReport>((resolve, reject) => {
      this.mailbox.send({ type: 'close', resolve, reject }).catch(reject)
    })

    const { closeTimeoutMs } = this.config
    if (closeTimeoutMs === undefined) return reply

    return withTimeout(
      reply,
      closeTimeoutMs,
      () => new TimeoutError(`Final flush did not complete within ${closeTimeoutMs}ms`),
    )
  }

  private async run(): Promise<void> {
    try {
      while (this.loopState !== 'stopped') {
        const message = await this.mailbox.receive()
        await this.handle(message)
      }
    } catch (error) {
      const fault = toError(error)
      this.loopState = 'stopped'
      this.stopFlushTimer()
      this.logger.error('Aggregation loop failed, flushing buffered metrics before exiting:', fault)
      this.settleLeftover(
        new BufferClosedError('Metrics buffer stopped after a fault', { cause: fault }),
      )
      await this.flushEvents()
      throw fault
    }
  }

  private async handle(message: TLoopMessage): Promise<void> {
    switch (message.type) {
      case 'tick': {
        this.tickPending = false
        const report = await this.flushEvents()
        if (report.error) {
          this.logger.warn(`Interval flush lost ${report.failed} metric(s):`, report.error)
        }
        return
      }
      case 'event':
        this.mergeIntoBuffer(message.event)
        return
      case 'flush':
        message.resolve(await this.flushEvents())
        return
      case 'close': {
        this.loopState = 'draining'
        this.stopFlushTimer()
        this.logger.info('Asked to terminate, flushing buffered metrics')
        const report = await this.flushEvents()
        this.loopState = 'stopped'
        this.settleLeftover(new BufferClosedError())
        message.resolve(report)
        return
      }
    }
  }

  private mergeIntoBuffer(event: TMetricEvent): void {
    const key = eventKey(event)
    const existing = this.events.get(key)
    if (existing) {
      mergeEvent(existing, event)
      return
    }
    this.events.set(key, event)
  }

  /** Must only run inside the loop: the map has no other guard. */
  private async flushEvents(): Promise<TFlushReport> {
    if (this.events.size === 0) return { sent: 0, failed: 0, error: null }

    const pending = [...this.events.values()]
    this.events.clear()

    const outcomes = await Promise.all(pending.map((event) => this.sendEvent(event)))

    let failed = 0
    let error: Error | null = null
    for (const outcome of outcomes) {
      if (outcome === null) continue
      failed++
      error ??= outcome
    }
    return { sent: pending.length - failed, failed, error }
  }

  private async sendEvent(event: TMetricEvent): Promise<Error | null> {
    try {
      await this.transport.send(event)
      return null
    } catch (error) {
      const sendError = toError(error)
      this.logger.warn(`Failed to send metric "${event.name}":`, sendError)
      return sendError
    }
  }

  /** Rejects queued requests and drops queued events once the loop has exited. */
  private settleLeftover(reason: BufferClosedError): void {
    this.stopFlushTimer()
    let dropped = 0
    for (const message of this.mailbox.close(reason)) {
      if (message.type === 'event') dropped++
      else if (message.type === 'flush' || message.type === 'close') message.reject(reason)
    }
    if (dropped > 0) {
      this.logger.warn(`Discarded ${dropped} queued metric event(s) after the loop stopped`)
    }
  }

  private startFlushTimer(): void {
    this.flushTimer = setInterval(() => {
      if (this.tickPending || this.mailbox.isClosed) return
      this.tickPending = true
      this.mailbox.post({ type: 'tick' })
    }, this.config.flushIntervalMs)
    this.flushTimer.unref()
  }

  private stopFlushTimer(): void {
    if (this.flushTimer) {
      clearInterval(this.flushTimer)
      this.flushTimer = null
    }
  }
}

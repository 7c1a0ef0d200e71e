import type { TMetricEvent } from '../events/types.ts'

/**
 * Configuration for the aggregation buffer.
 * Pass a partial config via {@link TBufferedMetricsClientOptions.config} to override the
 * environment and the defaults.
 */
export type TBufferConfig = {
  /** How often buffered metrics are sent to the transport (default: 1s) */
  flushIntervalMs: number
  /** Events queued ahead of the loop before submitters start waiting (default: 100) */
  queueCapacity: number
  /** Upper bound on how long close() waits for the final flush (default: unbounded) */
  closeTimeoutMs: number | undefined
}

export const DEFAULT_BUFFER_CONFIG: TBufferConfig = {
  flushIntervalMs: 1_000,
  queueCapacity: 100,
  closeTimeoutMs: undefined,
}

export type TBufferState = 'running' | 'draining' | 'stopped'

export type TFlushReport = {
  /** Events the transport accepted */
  sent: number
  /** Events the transport rejected; they are not retried */
  failed: number
  /** First send failure of this flush */
  error: Error | null
}

type TReply = {
  resolve: (report: TFlushReport) => void
  reject: (error: Error) => void
}

export type TLoopMessage =
  | { type: 'event'; event: TMetricEvent }
  | { type: 'tick' }
  | ({ type: 'flush' } & TReply)
  | ({ type: 'close' } & TReply)

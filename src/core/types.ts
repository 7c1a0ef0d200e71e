import type { TMetricEvent } from '../domains/events/types.ts'

/**
 * Downstream collaborator that turns one merged event into whatever the backend expects.
 * The aggregation loop calls `send` concurrently for every key of a flush, and `close` once
 * after the loop has stopped.
 */
export type TMetricsTransport = {
  send(event: TMetricEvent): Promise<void>
  close(): Promise<void>
}

export type TTokenProvider = {
  /** Returns a bearer token. Implementations may cache and rotate tokens. */
  getToken(signal?: AbortSignal): Promise<string>
}

export type TRetryPolicy = {
  attempts: number
  baseDelayInMilliseconds: number
  maximumDelayInMilliseconds: number
}

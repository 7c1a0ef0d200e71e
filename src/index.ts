// Main client
export { BufferedMetricsClient } from './client/buffered-metrics-client.ts'
export type { TBufferedMetricsClientOptions } from './client/buffered-metrics-client.ts'

// Core buffer (for custom façades)
export { AggregationBuffer } from './domains/aggregation/aggregation.feature.ts'
export type { TAggregationBufferOptions } from './domains/aggregation/aggregation.feature.ts'
export { DEFAULT_BUFFER_CONFIG } from './domains/aggregation/types.ts'
export type { TBufferConfig, TBufferState, TFlushReport } from './domains/aggregation/types.ts'
export { readEnvConfig, resolveBufferConfig } from './core/config.ts'

// Events
export {
  cloneEvent,
  createAbsolute,
  createGauge,
  createIncrement,
  createTiming,
  createTotal,
  eventKey,
  mergeEvent,
  renderEvent,
} from './domains/events/events.ts'
export { computePercentiles } from './domains/events/percentiles.ts'
export type {
  TMetricKind,
  TMetricEvent,
  TIncrementEvent,
  TGaugeEvent,
  TAbsoluteEvent,
  TTotalEvent,
  TTimingEvent,
  TPercentiles,
} from './domains/events/types.ts'

// Providers - Transport
export { HttpMetricsTransport } from './providers/transport/http-transport.ts'
export type {
  THttpMetricsTransportOptions,
  TMetricDocument,
} from './providers/transport/http-transport.ts'

// Errors
export {
  ConfigurationError,
  InvalidMetricError,
  MetricMergeError,
  BufferClosedError,
  CloseError,
  TransportError,
  TransportClosedError,
  TimeoutError,
  AbortOperationError,
} from './core/errors.ts'

// Types
export type { TLogger } from './core/logger.ts'
export type { TMetricsTransport, TTokenProvider, TRetryPolicy } from './core/types.ts'

/** Indicates a configuration problem detected at construction time. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}
/** Indicates a metric submitted with an empty name or a non-finite value. */
export class InvalidMetricError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidMetricError'
  }
}
/** Indicates two events that cannot be merged: different keys, or different kinds under one key. */
export class MetricMergeError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'MetricMergeError'
  }
}
/** Indicates the aggregation loop has stopped and accepts no more messages. */
export class BufferClosedError extends Error {
  constructor(message = 'Metrics buffer is closed', options?: ErrorOptions) {
    super(message, options)
    this.name = 'BufferClosedError'
  }
}
/**
 * Raised by close() when both the final flush and the transport close failed.
 * `cause` is the flush error.
 */
export class CloseError extends Error {
  public readonly flushError: Error
  public readonly transportError: Error

  constructor(flushError: Error, transportError: Error) {
    super(
      `Final flush failed: ${flushError.message}; ` +
        `transport close failed: ${transportError.message}`,
      { cause: flushError },
    )
    this.name = 'CloseError'
    this.flushError = flushError
    this.transportError = transportError
  }
}
/** Indicates a non-successful HTTP response from the metrics endpoint. */
export class TransportError extends Error {
  public readonly status: number | undefined

  constructor(message: string, status?: number) {
    super(message)
    this.name = 'TransportError'
    this.status = status
  }
}
/** Indicates a send on a transport that has already been closed. */
export class TransportClosedError extends Error {
  constructor(message = 'Transport is closed') {
    super(message)
    this.name = 'TransportClosedError'
  }
}
/** Indicates an operation exceeded its time budget. */
export class TimeoutError extends Error {
  constructor(message = 'Operation timed out') {
    super(message)
    this.name = 'TimeoutError'
  }
}
/** Indicates an operation was aborted via AbortSignal. */
export class AbortOperationError extends Error {
  constructor(message = 'Operation aborted') {
    super(message)
    this.name = 'AbortOperationError'
  }
}

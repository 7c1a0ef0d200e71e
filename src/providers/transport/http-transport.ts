import { hostname } from 'os'
import { randomUUID } from 'crypto'
import { AbortOperationError, TransportClosedError, TransportError } from '../../core/errors.ts'
import { calculateBackoff, DEFAULT_RETRY_POLICY, sleep } from '../../core/retry.ts'
import { USER_AGENT } from '../../core/sdk-info.ts'
import type { TMetricsTransport, TRetryPolicy, TTokenProvider } from '../../core/types.ts'
import {
  createTimeoutSignal,
  extractResponseErrorDetail,
  normalizeBaseUrl,
  resolveFetch,
} from '../../core/utils.ts'
import { renderEvent } from '../../domains/events/events.ts'
import type { TMetricEvent, TMetricKind } from '../../domains/events/types.ts'

const DEFAULT_TIMEOUT_IN_MILLISECONDS = 1500
const METRICS_PATH = '/metrics'

export type TMetricDocument = {
  instanceId: string
  name: string
  kind: TMetricKind
  lines: string[]
  event: TMetricEvent
}

export type THttpMetricsTransportOptions = {
  baseUrl: string
  /** Adds a bearer token to every request when set */
  tokenProvider?: TTokenProvider
  /** Identifies this process to the backend (default: hostname-pid-random) */
  instanceId?: string
  retryPolicy?: TRetryPolicy
  timeoutInMilliseconds?: number
  fetchImplementation?: typeof fetch
}

function generateInstanceId(): string {
  const host = hostname()
    .toLowerCase()
    .replace(/[^a-z0-9]/g, '')
  return `${host || 'host'}-${process.pid}-${randomUUID().slice(0, 8)}`
}

/**
 * Posts each merged event as one JSON document to `{baseUrl}/metrics`.
 * Network errors and 5xx responses are retried with backoff; 4xx responses are not.
 */
export class HttpMetricsTransport implements TMetricsTransport {
  public readonly instanceId: string

  private readonly baseUrl: string
  private readonly tokenProvider: TTokenProvider | undefined
  private readonly retryPolicy: TRetryPolicy
  private readonly timeoutInMilliseconds: number
  private readonly fetchImplementation: typeof fetch
  private readonly lifetime = new AbortController()

  constructor(options: THttpMetricsTransportOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl)
    this.tokenProvider = options.tokenProvider
    this.instanceId = options.instanceId ?? generateInstanceId()
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.timeoutInMilliseconds = options.timeoutInMilliseconds ?? DEFAULT_TIMEOUT_IN_MILLISECONDS
    this.fetchImplementation = resolveFetch(options.fetchImplementation)
  }

  public async send(event: TMetricEvent): Promise<void> {
    if (this.lifetime.signal.aborted) throw new TransportClosedError()

    const document: TMetricDocument = {
      instanceId: this.instanceId,
      name: event.name,
      kind: event.kind,
      lines: renderEvent(event),
      event,
    }

    let lastError: unknown
    for (let attemptIndex = 0; attemptIndex < this.retryPolicy.attempts; attemptIndex++) {
      try {
        await this.post(document)
        return
      } catch (caughtError) {
        lastError = caughtError
        if (!this.isRetryable(caughtError)) throw caughtError
        if (attemptIndex < this.retryPolicy.attempts - 1) {
          await sleep(
            calculateBackoff(
              attemptIndex,
              this.retryPolicy.baseDelayInMilliseconds,
              this.retryPolicy.maximumDelayInMilliseconds,
            ),
            this.lifetime.signal,
          )
        }
      }
    }
    throw lastError
  }

  /** Aborts in-flight requests; later sends reject with TransportClosedError. */
  public async close(): Promise<void> {
    this.lifetime.abort()
  }

  private async post(document: TMetricDocument): Promise<void> {
    const { signal, cleanup } = createTimeoutSignal(
      this.timeoutInMilliseconds,
      this.lifetime.signal,
    )

    try {
      const headers: Record<string, string> = {
        'content-type': 'application/json',
        'user-agent': USER_AGENT,
      }
      if (this.tokenProvider) {
        headers.authorization = `Bearer ${await this.tokenProvider.getToken(signal)}`
      }

      const httpResponse = await this.fetchImplementation(`${this.baseUrl}${METRICS_PATH}`, {
        method: 'POST',
        headers,
        body: JSON.stringify(document),
        signal,
      })

      if (!httpResponse.ok) {
        const errorDetail = await extractResponseErrorDetail(httpResponse)
        throw new TransportError(
          `HTTP ${httpResponse.status} for POST ${METRICS_PATH}${errorDetail}`,
          httpResponse.status,
        )
      }
    } finally {
      cleanup()
    }
  }

  private isRetryable(error: unknown): boolean {
    if (this.lifetime.signal.aborted) return false
    if (error instanceof AbortOperationError) return false
    if (error instanceof TransportError) {
      return error.status !== undefined && error.status >= 500 && error.status <= 599
    }
    return true
  }
}

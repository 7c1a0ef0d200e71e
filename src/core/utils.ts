import { ConfigurationError, InvalidMetricError } from './errors.ts'

export function normalizeBaseUrl(url: string): string {
  return url.replace(/\/$/, '')
}

export function resolveFetch(override?: typeof fetch): typeof fetch {
  const resolved = override ?? (globalThis as unknown as { fetch?: typeof fetch }).fetch
  if (!resolved) {
    throw new ConfigurationError(
      'No fetch implementation available. ' +
        'Provide a fetchImplementation option or use Node.js >= 18.',
    )
  }
  return resolved
}

export async function extractResponseErrorDetail(response: Response): Promise<string> {
  try {
    const body: unknown = await response.json()
    if (
      typeof body === 'object' &&
      body !== null &&
      'message' in body &&
      typeof body.message === 'string'
    ) {
      return `: ${body.message}`
    }
  } catch {
    // body was not JSON
  }

  return ''
}

/** Normalizes a rejection reason into an Error. */
export function toError(reason: unknown): Error {
  if (reason instanceof Error) return reason
  return new Error(typeof reason === 'string' ? reason : `Non-error thrown: ${String(reason)}`)
}

/** Settles like `promise`, or rejects with `timeoutError()` once `timeoutMs` passes first. */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  timeoutError: () => Error,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(timeoutError()), timeoutMs)
    promise.then(
      (value) => {
        clearTimeout(timer)
        resolve(value)
      },
      (error: unknown) => {
        clearTimeout(timer)
        reject(error)
      },
    )
  })
}

export function createTimeoutSignal(
  timeoutMs: number,
  outerSignal?: AbortSignal,
): { signal: AbortSignal; cleanup: () => void } {
  const controller = new AbortController()
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs)
  timeoutId.unref()
  const signal = outerSignal ? AbortSignal.any([controller.signal, outerSignal]) : controller.signal
  return { signal, cleanup: () => clearTimeout(timeoutId) }
}

export function validateMetricName(name: unknown): asserts name is string {
  if (typeof name !== 'string' || name.length === 0) {
    throw new InvalidMetricError('Metric name must be a non-empty string')
  }
}

export function validateMetricValue(name: string, value: unknown): asserts value is number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidMetricError(
      `Metric "${name}" value must be a finite number, got ${String(value)}`,
    )
  }
}

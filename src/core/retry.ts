import { AbortOperationError } from './errors.ts'
import type { TRetryPolicy } from './types.ts'

export const DEFAULT_RETRY_POLICY: TRetryPolicy = {
  attempts: 3,
  baseDelayInMilliseconds: 100,
  maximumDelayInMilliseconds: 1000,
}

/** Exponential delay for the given zero-based attempt, capped, plus up to 25% jitter. */
export function calculateBackoff(
  attemptIndex: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  const exponential = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attemptIndex))
  const jitter = Math.random() * 0.25 * exponential
  return exponential + jitter
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortOperationError())
      return
    }

    const onAbort = () => {
      clearTimeout(timeoutId)
      reject(new AbortOperationError())
    }

    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    timeoutId.unref()

    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

import type { TPercentiles } from './types.ts'

/** Linear interpolation between closest ranks, rounded to whole milliseconds. */
export function computePercentiles(samples: number[]): TPercentiles {
  if (samples.length === 0) {
    return { p50: 0, p95: 0, p99: 0 }
  }

  const sorted = [...samples].sort((a, b) => a - b)

  const percentile = (p: number): number => {
    const index = (p / 100) * (sorted.length - 1)
    const lower = Math.floor(index)
    const upper = Math.ceil(index)
    const weight = index - lower

    const lowerValue = sorted[lower]
    const upperValue = sorted[upper]
    if (lowerValue === undefined) return 0
    if (lower === upper || upperValue === undefined) return lowerValue

    return lowerValue * (1 - weight) + upperValue * weight
  }

  return {
    p50: Math.round(percentile(50)),
    p95: Math.round(percentile(95)),
    p99: Math.round(percentile(99)),
  }
}

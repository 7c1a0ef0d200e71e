export type TMetricKind = 'increment' | 'gauge' | 'absolute' | 'total' | 'timing'

/** Signed counter delta. Merging sums the deltas. */
export type TIncrementEvent = {
  kind: 'increment'
  name: string
  value: number
}

/** Point-in-time reading. Latest wins. */
export type TGaugeEvent = {
  kind: 'gauge'
  name: string
  value: number
}

/** Value set reported as-is, never averaged. Latest set wins. */
export type TAbsoluteEvent = {
  kind: 'absolute'
  name: string
  values: number[]
}

/** Monotonic running total, e.g. reads since boot. Latest wins. */
export type TTotalEvent = {
  kind: 'total'
  name: string
  value: number
}

/** Duration distribution in milliseconds. */
export type TTimingEvent = {
  kind: 'timing'
  name: string
  count: number
  sum: number
  min: number
  max: number
  samples: number[]
}

export type TMetricEvent =
  | TIncrementEvent
  | TGaugeEvent
  | TAbsoluteEvent
  | TTotalEvent
  | TTimingEvent

export type TPercentiles = { p50: number; p95: number; p99: number }

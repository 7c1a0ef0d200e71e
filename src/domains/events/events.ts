import { MetricMergeError } from '../../core/errors.ts'
import { computePercentiles } from './percentiles.ts'
import type {
  TAbsoluteEvent,
  TGaugeEvent,
  TIncrementEvent,
  TMetricEvent,
  TTimingEvent,
  TTotalEvent,
} from './types.ts'

export function createIncrement(name: string, delta: number): TIncrementEvent {
  return { kind: 'increment', name, value: delta }
}

export function createGauge(name: string, value: number): TGaugeEvent {
  return { kind: 'gauge', name, value }
}

export function createAbsolute(name: string, value: number): TAbsoluteEvent {
  return { kind: 'absolute', name, values: [value] }
}

export function createTotal(name: string, value: number): TTotalEvent {
  return { kind: 'total', name, value }
}

export function createTiming(name: string, durationMs: number): TTimingEvent {
  return {
    kind: 'timing',
    name,
    count: 1,
    sum: durationMs,
    min: durationMs,
    max: durationMs,
    samples: [durationMs],
  }
}

/** Copies the event, including its value arrays. */
export function cloneEvent(event: TMetricEvent): TMetricEvent {
  switch (event.kind) {
    case 'absolute':
      return { ...event, values: [...event.values] }
    case 'timing':
      return { ...event, samples: [...event.samples] }
    default:
      return { ...event }
  }
}

/** Events with equal keys are merged into one buffered entry. */
export function eventKey(event: TMetricEvent): string {
  return event.name
}

function kindMismatch(target: TMetricEvent, incoming: TMetricEvent): MetricMergeError {
  return new MetricMergeError(
    `Cannot merge ${incoming.kind} into ${target.kind} for metric "${target.name}"`,
  )
}

/**
 * Folds `incoming` into `target` in place.
 * Increments sum, timings accumulate, every other kind takes the incoming value.
 */
export function mergeEvent(target: TMetricEvent, incoming: TMetricEvent): void {
  if (eventKey(target) !== eventKey(incoming)) {
    throw new MetricMergeError(
      `Cannot merge events with different keys: "${eventKey(target)}" and "${eventKey(incoming)}"`,
    )
  }

  switch (target.kind) {
    case 'increment':
      if (incoming.kind !== 'increment') throw kindMismatch(target, incoming)
      target.value += incoming.value
      return
    case 'gauge':
      if (incoming.kind !== 'gauge') throw kindMismatch(target, incoming)
      target.value = incoming.value
      return
    case 'absolute':
      if (incoming.kind !== 'absolute') throw kindMismatch(target, incoming)
      target.values = [...incoming.values]
      return
    case 'total':
      if (incoming.kind !== 'total') throw kindMismatch(target, incoming)
      target.value = incoming.value
      return
    case 'timing':
      if (incoming.kind !== 'timing') throw kindMismatch(target, incoming)
      target.count += incoming.count
      target.sum += incoming.sum
      target.min = Math.min(target.min, incoming.min)
      target.max = Math.max(target.max, incoming.max)
      target.samples.push(...incoming.samples)
      return
  }
}

/** StatsD-style lines for one merged event. */
export function renderEvent(event: TMetricEvent): string[] {
  switch (event.kind) {
    case 'increment':
      return [`${event.name}:${event.value}|c`]
    case 'gauge':
      // A leading sign is read as a delta by StatsD, so reset to zero first
      if (event.value < 0) return [`${event.name}:0|g`, `${event.name}:${event.value}|g`]
      return [`${event.name}:${event.value}|g`]
    case 'absolute':
      return event.values.map((value) => `${event.name}:${value}|a`)
    case 'total':
      return [`${event.name}:${event.value}|t`]
    case 'timing': {
      const { p50, p95, p99 } = computePercentiles(event.samples)
      const avg = event.count > 0 ? Math.round(event.sum / event.count) : 0
      return [
        `${event.name}.count:${event.count}|c`,
        `${event.name}.avg:${avg}|ms`,
        `${event.name}.min:${event.min}|ms`,
        `${event.name}.max:${event.max}|ms`,
        `${event.name}.p50:${p50}|ms`,
        `${event.name}.p95:${p95}|ms`,
        `${event.name}.p99:${p99}|ms`,
      ]
    }
  }
}

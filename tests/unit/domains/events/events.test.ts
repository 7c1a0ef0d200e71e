import { describe, expect, it } from 'vitest'
import { MetricMergeError } from '../../../../src/core/errors.ts'
import {
  createAbsolute,
  createGauge,
  createIncrement,
  createTiming,
  createTotal,
  cloneEvent,
  eventKey,
  mergeEvent,
  renderEvent,
} from '../../../../src/domains/events/events.ts'
import { computePercentiles } from '../../../../src/domains/events/percentiles.ts'

describe('mergeEvent', () => {
  it('sums increment deltas, negative ones included', () => {
    const target = createIncrement('requests', 1)

    mergeEvent(target, createIncrement('requests', 2))
    mergeEvent(target, createIncrement('requests', -1))

    expect(target).toEqual({ kind: 'increment', name: 'requests', value: 2 })
  })

  it('keeps the latest gauge reading', () => {
    const target = createGauge('queue-depth', 10)

    mergeEvent(target, createGauge('queue-depth', 0))

    expect(target.value).toBe(0)
  })

  it('replaces the absolute value set with the latest one', () => {
    const target = createAbsolute('batch-size', 4)

    mergeEvent(target, createAbsolute('batch-size', 9))

    expect(target.values).toEqual([9])
  })

  it('keeps the latest running total', () => {
    const target = createTotal('disk-reads', 100)

    mergeEvent(target, createTotal('disk-reads', 250))

    expect(target.value).toBe(250)
  })

  it('accumulates timing samples', () => {
    const target = createTiming('db.query', 40)

    mergeEvent(target, createTiming('db.query', 10))
    mergeEvent(target, createTiming('db.query', 25))

    expect(target).toEqual({
      kind: 'timing',
      name: 'db.query',
      count: 3,
      sum: 75,
      min: 10,
      max: 40,
      samples: [40, 10, 25],
    })
  })

  it('refuses to merge events with different keys', () => {
    const target = createIncrement('a', 1)

    expect(() => mergeEvent(target, createIncrement('b', 1))).toThrow(MetricMergeError)
    expect(target.value).toBe(1)
  })

  it('refuses to merge different kinds under one key', () => {
    const target = createIncrement('jobs', 1)

    expect(() => mergeEvent(target, createGauge('jobs', 5))).toThrow(
      'Cannot merge gauge into increment for metric "jobs"',
    )
  })
})

describe('cloneEvent', () => {
  it('copies value arrays so merging into the copy leaves the original alone', () => {
    const original = createTiming('lap', 5)
    const copy = cloneEvent(original)

    mergeEvent(copy, createTiming('lap', 7))

    expect(original.samples).toEqual([5])
    expect(copy).toMatchObject({ count: 2, sum: 12, samples: [5, 7] })
  })

  it('copies absolute values', () => {
    const original = createAbsolute('batch', 3)
    const copy = cloneEvent(original)

    expect(copy).toEqual(original)
    expect(copy.kind === 'absolute' && copy.values).not.toBe(original.values)
  })
})

describe('eventKey', () => {
  it('is the metric name for every kind', () => {
    expect(eventKey(createIncrement('x', 1))).toBe('x')
    expect(eventKey(createTiming('y', 1))).toBe('y')
    expect(eventKey(createAbsolute('z', 1))).toBe('z')
  })
})

describe('renderEvent', () => {
  it('renders counters, gauges, absolutes and totals as single lines', () => {
    expect(renderEvent(createIncrement('hits', 3))).toEqual(['hits:3|c'])
    expect(renderEvent(createGauge('temp', 21))).toEqual(['temp:21|g'])
    expect(renderEvent(createTotal('reads', 42))).toEqual(['reads:42|t'])
    expect(renderEvent(createAbsolute('size', 7))).toEqual(['size:7|a'])
  })

  it('resets a negative gauge to zero before the value', () => {
    expect(renderEvent(createGauge('balance', -5))).toEqual(['balance:0|g', 'balance:-5|g'])
  })

  it('renders timing summaries', () => {
    const timing = createTiming('render', 100)
    mergeEvent(timing, createTiming('render', 300))
    mergeEvent(timing, createTiming('render', 200))

    expect(renderEvent(timing)).toEqual([
      'render.count:3|c',
      'render.avg:200|ms',
      'render.min:100|ms',
      'render.max:300|ms',
      'render.p50:200|ms',
      'render.p95:290|ms',
      'render.p99:298|ms',
    ])
  })
})

describe('computePercentiles', () => {
  it('returns zeros for no samples', () => {
    expect(computePercentiles([])).toEqual({ p50: 0, p95: 0, p99: 0 })
  })

  it('returns the sample itself for a single sample', () => {
    expect(computePercentiles([17])).toEqual({ p50: 17, p95: 17, p99: 17 })
  })

  it('does not reorder the input', () => {
    const samples = [30, 10, 20]

    computePercentiles(samples)

    expect(samples).toEqual([30, 10, 20])
  })
})

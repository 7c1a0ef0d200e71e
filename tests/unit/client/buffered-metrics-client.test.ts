import { faker } from '@faker-js/faker'
import { afterEach, describe, expect, it, vi } from 'vitest'
import {
  BufferedMetricsClient,
  type TBufferedMetricsClientOptions,
} from '../../../src/client/buffered-metrics-client.ts'
import { InvalidMetricError } from '../../../src/core/errors.ts'
import type { TMetricEvent } from '../../../src/domains/events/types.ts'
import {
  createMockLogger,
  makeCallerOperations,
  MemoryTransport,
  SHARED_COUNTERS,
  SHARED_TIMING,
  TEST_CONFIG,
  type TFuzzOperation,
} from '../../helpers/index.ts'

function createClient(overrides?: Partial<TBufferedMetricsClientOptions>) {
  const transport = new MemoryTransport()
  const logger = createMockLogger()
  const client = new BufferedMetricsClient({
    transport,
    logger,
    prefix: '',
    config: { flushIntervalMs: TEST_CONFIG.flushIntervalMs },
    ...overrides,
  })
  return { client, transport, logger }
}

describe('BufferedMetricsClient - submission', () => {
  it('ignores zero increments and decrements', async () => {
    const { client, transport } = createClient()

    await client.increment('noop', 0)
    await client.decrement('noop', 0)
    const report = await client.flush()

    expect(report.sent).toBe(0)
    expect(transport.sent).toEqual([])

    await client.close()
  })

  it('counts by one when no delta is given', async () => {
    const { client, transport } = createClient()

    await client.increment('visits')
    await client.increment('visits')
    await client.decrement('visits')
    await client.flush()

    expect(transport.sent).toEqual([{ kind: 'increment', name: 'visits', value: 1 }])

    await client.close()
  })

  it('decrements by inverting the sign', async () => {
    const { client, transport } = createClient()

    await client.decrement('stock', 3)
    await client.flush()

    expect(transport.sent).toEqual([{ kind: 'increment', name: 'stock', value: -3 }])

    await client.close()
  })

  it('always sends a zero gauge', async () => {
    const { client, transport } = createClient()

    await client.gauge('connections', 0)
    await client.flush()

    expect(transport.sent).toEqual([{ kind: 'gauge', name: 'connections', value: 0 }])

    await client.close()
  })

  it('builds the matching event for each kind', async () => {
    const { client, transport } = createClient()

    await client.absolute('batch', 12)
    await client.total('reads', 9000)
    await client.timing('render', 42)
    await client.flush()

    expect(transport.find('batch')).toEqual({ kind: 'absolute', name: 'batch', values: [12] })
    expect(transport.find('reads')).toEqual({ kind: 'total', name: 'reads', value: 9000 })
    expect(transport.find('render')).toEqual({
      kind: 'timing',
      name: 'render',
      count: 1,
      sum: 42,
      min: 42,
      max: 42,
      samples: [42],
    })

    await client.close()
  })

  it('prepends the prefix to every name', async () => {
    const { client, transport } = createClient({ prefix: 'checkout.' })

    await client.increment('orders', 2)
    await client.gauge('cart-size', 3)
    await client.flush()

    expect(transport.sentNames()).toEqual(['checkout.cart-size', 'checkout.orders'])

    await client.close()
  })

  it('takes the prefix from the environment when none is given', async () => {
    vi.stubEnv('METRICS_PREFIX', 'env.')
    const transport = new MemoryTransport()
    const client = new BufferedMetricsClient({ transport, logger: createMockLogger() })

    await client.increment('jobs')
    await client.close()

    expect(transport.sentNames()).toEqual(['env.jobs'])
    vi.unstubAllEnvs()
  })

  it('rejects an empty name or a non-finite value without queueing anything', async () => {
    const { client, transport } = createClient()

    await expect(client.increment('', 1)).rejects.toBeInstanceOf(InvalidMetricError)
    await expect(client.gauge('temp', Number.NaN)).rejects.toThrow(
      'Metric "temp" value must be a finite number, got NaN',
    )
    await expect(client.timing('latency', Number.POSITIVE_INFINITY)).rejects.toBeInstanceOf(
      InvalidMetricError,
    )
    await client.flush()

    expect(transport.sent).toEqual([])

    await client.close()
  })
})

describe('BufferedMetricsClient - time()', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('returns the result and records the elapsed time', async () => {
    const { client, transport } = createClient()
    vi.spyOn(performance, 'now').mockReturnValueOnce(1_000).mockReturnValueOnce(1_250)

    const result = await client.time('lookup', async () => 'found')
    await client.flush()

    expect(result).toBe('found')
    expect(transport.find('lookup')).toMatchObject({ kind: 'timing', count: 1, sum: 250 })

    await client.close()
  })

  it('records the timing and rethrows when the work fails', async () => {
    const { client, transport } = createClient()
    vi.spyOn(performance, 'now').mockReturnValueOnce(10).mockReturnValueOnce(15)

    await expect(
      client.time('charge', () => {
        throw new Error('card declined')
      }),
    ).rejects.toThrow('card declined')
    await client.flush()

    expect(transport.find('charge')).toMatchObject({ kind: 'timing', samples: [5] })

    await client.close()
  })

  it('logs instead of failing when the timing cannot be queued', async () => {
    const { client, logger } = createClient()
    await client.close()

    await expect(client.time('late', () => 7)).resolves.toBe(7)
    expect(logger.warn).toHaveBeenCalledTimes(1)
  })
})

describe('BufferedMetricsClient - lifecycle', () => {
  it('drains everything submitted before close and closes the transport last', async () => {
    const { client, transport } = createClient()

    await client.increment('a')
    await client.gauge('b', 1)
    await client.timing('c', 3)
    await client.close()

    expect(transport.sentNames()).toEqual(['a', 'b', 'c'])
    expect(transport.log).toHaveLength(4)
    expect(transport.log[3]).toBe('close')
    expect(transport.closeCount).toBe(1)
    await expect(client.done).resolves.toBeUndefined()
  })
})

type TExpectedTiming = { count: number; sum: number; min: number; max: number; samples: number[] }

function foldOperations(callers: TFuzzOperation[][]) {
  const counters = new Map<string, number>()
  const lastValue = new Map<string, number>()
  const timing: TExpectedTiming = { count: 0, sum: 0, min: Infinity, max: -Infinity, samples: [] }

  for (const operations of callers) {
    for (const operation of operations) {
      switch (operation.kind) {
        case 'increment':
        case 'decrement': {
          if (operation.value === 0) break
          const sign = operation.kind === 'increment' ? 1 : -1
          counters.set(operation.name, (counters.get(operation.name) ?? 0) + sign * operation.value)
          break
        }
        case 'timing':
          timing.count++
          timing.sum += operation.value
          timing.min = Math.min(timing.min, operation.value)
          timing.max = Math.max(timing.max, operation.value)
          timing.samples.push(operation.value)
          break
        case 'gauge':
        case 'total':
          lastValue.set(operation.name, operation.value)
          break
      }
    }
  }
  return { counters, lastValue, timing }
}

function apply(client: BufferedMetricsClient, operation: TFuzzOperation): Promise<void> {
  switch (operation.kind) {
    case 'increment':
      return client.increment(operation.name, operation.value)
    case 'decrement':
      return client.decrement(operation.name, operation.value)
    case 'timing':
      return client.timing(operation.name, operation.value)
    case 'gauge':
      return client.gauge(operation.name, operation.value)
    case 'total':
      return client.total(operation.name, operation.value)
  }
}

function sortedSamples(event: TMetricEvent | undefined): number[] {
  if (!event || event.kind !== 'timing') return []
  return [...event.samples].sort((a, b) => a - b)
}

describe('BufferedMetricsClient - concurrent submission', () => {
  it.each([11, 29, 47])('folds fuzzed submissions from many callers (seed %i)', async (seed) => {
    faker.seed(seed)
    const callers = Array.from({ length: 8 }, (_, index) => makeCallerOperations(index, 60))
    const expected = foldOperations(callers)
    const { client, transport } = createClient({
      config: { flushIntervalMs: TEST_CONFIG.flushIntervalMs, queueCapacity: 4 },
    })

    await Promise.all(
      callers.map(async (operations) => {
        for (const operation of operations) {
          await apply(client, operation)
        }
      }),
    )
    await client.close()

    const names = transport.sent.map((event) => event.name)
    expect(new Set(names).size).toBe(names.length)

    for (const name of SHARED_COUNTERS) {
      const event = transport.find(name)
      if (!expected.counters.has(name)) {
        expect(event).toBeUndefined()
        continue
      }
      expect(event).toEqual({ kind: 'increment', name, value: expected.counters.get(name) })
    }

    for (const [name, value] of expected.lastValue) {
      expect(transport.find(name)).toMatchObject({ name, value })
    }

    if (expected.timing.count > 0) {
      expect(transport.find(SHARED_TIMING)).toMatchObject({
        kind: 'timing',
        count: expected.timing.count,
        sum: expected.timing.sum,
        min: expected.timing.min,
        max: expected.timing.max,
      })
      expect(sortedSamples(transport.find(SHARED_TIMING))).toEqual(
        [...expected.timing.samples].sort((a, b) => a - b),
      )
    }

    expect(transport.sent).toHaveLength(
      expected.counters.size + expected.lastValue.size + (expected.timing.count > 0 ? 1 : 0),
    )
  })
})

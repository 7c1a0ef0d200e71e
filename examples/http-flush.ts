/**
 * Sends a burst of metrics through the buffer to a local HTTP collector.
 *
 * Usage:
 *   METRICS_BASE_URL=http://localhost:8125 npx tsx examples/http-flush.ts
 */

import { BufferedMetricsClient } from '../src/client/buffered-metrics-client.ts'
import { HttpMetricsTransport } from '../src/providers/transport/http-transport.ts'

const CONFIG = {
  baseUrl: process.env.METRICS_BASE_URL ?? 'http://localhost:8125',
  token: process.env.METRICS_TOKEN,
  flushIntervalMs: 2_000,
}

async function main(): Promise<void> {
  const token = CONFIG.token
  const transport = new HttpMetricsTransport({
    baseUrl: CONFIG.baseUrl,
    tokenProvider: token ? { getToken: async () => token } : undefined,
  })

  const metrics = new BufferedMetricsClient({
    transport,
    prefix: 'example.',
    config: { flushIntervalMs: CONFIG.flushIntervalMs },
  })

  console.log(`Instance ${transport.instanceId} sending to ${CONFIG.baseUrl}`)

  // 10k raw events collapse into three datapoints per flush
  for (let i = 0; i < 10_000; i++) {
    await metrics.increment('requests')
    await metrics.gauge('in-flight', i % 25)
    await metrics.timing('handler', 5 + (i % 40))
  }

  await metrics.time('slow-call', () => new Promise((resolve) => setTimeout(resolve, 120)))

  const report = await metrics.flush()
  console.log(`Flushed: ${report.sent} sent, ${report.failed} failed`)

  await metrics.close()
}

main().catch((error: unknown) => {
  console.error(error)
  process.exit(1)
})

import { DEFAULT_BUFFER_CONFIG, type TBufferConfig } from '../domains/aggregation/types.ts'

export type TEnvConfig = Partial<TBufferConfig> & { prefix?: string }

function readPositiveNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return undefined
  const value = Number(raw)
  return Number.isFinite(value) && value > 0 ? value : undefined
}

/**
 * Reads buffer settings from the environment:
 * METRICS_FLUSH_INTERVAL_MS, METRICS_QUEUE_CAPACITY, METRICS_CLOSE_TIMEOUT_MS, METRICS_PREFIX.
 * Unset or invalid values are left out so defaults apply.
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): TEnvConfig {
  const config: TEnvConfig = {}

  const flushIntervalMs = readPositiveNumber(env, 'METRICS_FLUSH_INTERVAL_MS')
  if (flushIntervalMs !== undefined) config.flushIntervalMs = flushIntervalMs

  const queueCapacity = readPositiveNumber(env, 'METRICS_QUEUE_CAPACITY')
  if (queueCapacity !== undefined) config.queueCapacity = Math.floor(queueCapacity)

  const closeTimeoutMs = readPositiveNumber(env, 'METRICS_CLOSE_TIMEOUT_MS')
  if (closeTimeoutMs !== undefined) config.closeTimeoutMs = closeTimeoutMs

  const prefix = env.METRICS_PREFIX
  if (prefix) config.prefix = prefix

  return config
}

/** Merges overrides over defaults; non-positive interval or capacity fall back to the default. */
export function resolveBufferConfig(overrides?: Partial<TBufferConfig>): TBufferConfig {
  const config: TBufferConfig = { ...DEFAULT_BUFFER_CONFIG, ...overrides }
  if (!(config.flushIntervalMs > 0)) config.flushIntervalMs = DEFAULT_BUFFER_CONFIG.flushIntervalMs
  if (!(config.queueCapacity >= 1)) config.queueCapacity = DEFAULT_BUFFER_CONFIG.queueCapacity
  config.queueCapacity = Math.floor(config.queueCapacity)
  if (config.closeTimeoutMs !== undefined && !(config.closeTimeoutMs > 0)) {
    config.closeTimeoutMs = undefined
  }
  return config
}

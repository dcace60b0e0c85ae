import { createPinoLogger, type Logger } from "@layercache/logger"
import { MemoryCacheBackend } from "./adapters/memory/memory-cache-backend"
import type { CacheConfig } from "./config/cache-config"
import { Cache } from "./core/cache"
import { type Clock, SystemClock } from "./core/time/clock"
import type { StoredEntry } from "./ports/stored-entry"

export type CreateCacheDeps = {
  /** Replaces the pino logger built from `config.logging`. */
  logger?: Logger
  clock?: Clock
}

/**
 * Build a {@link Cache} over a fresh {@link MemoryCacheBackend} from loaded
 * configuration.
 *
 * @example
 * ```ts
 * const config = await loadCacheConfig(process.env)
 * const cache = createCache<Session>(config)
 * ```
 */
export function createCache<T = unknown>(
  config: CacheConfig,
  deps: CreateCacheDeps = {},
): Cache<T> {
  const logger =
    deps.logger ??
    createPinoLogger(
      {},
      { level: config.logging.level, prettify: config.logging.prettify },
      { service: config.service.name },
    )

  const backend = new MemoryCacheBackend<StoredEntry<T>>(
    { clock: deps.clock ?? new SystemClock() },
    { maxEntries: config.memory.maxEntries, evictionPolicy: config.memory.evictionPolicy },
  )

  return new Cache<T>(
    { backend, logger },
    {
      keyPrefix: config.cache.keyPrefix,
      defaultTtl: config.cache.defaultTtl,
      keyNormalization: config.cache.keyNormalization,
    },
  )
}

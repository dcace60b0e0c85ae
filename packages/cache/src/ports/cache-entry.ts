import type { BackendKey, CacheKey } from "./cache-key"

/**
 * A key–value pair used for bulk cache writes.
 */
export type CacheEntry<T> = readonly [CacheKey, T]

/**
 * A key–value pair as handed to a backend, after key normalization.
 */
export type BackendEntry<T> = readonly [BackendKey, T]

import type { CacheEntry } from "./cache-entry"
import type { CacheKey } from "./cache-key"
import type { Ttl } from "./cache-ttl"
import type { Dependency } from "./dependency"

/**
 * Produces a value for {@link CacheInterface.getOrSet} on a miss. Receives the
 * cache itself so that computations can use it recursively.
 */
export type ComputeValue<T> = (cache: CacheInterface) => T | Promise<T>

/**
 * The cache facade's public surface.
 *
 * @remarks
 * An absent entry reads as `undefined` unless a default is passed. A TTL of
 * `undefined` or `null` falls back to the facade's default TTL.
 */
export interface CacheInterface<T = unknown> {
  get(key: CacheKey): Promise<T | undefined>
  get<D>(key: CacheKey, defaultValue: D): Promise<T | D>

  has(key: CacheKey): Promise<boolean>

  getMultiple(keys: Iterable<CacheKey>): Promise<Map<CacheKey, T | undefined>>
  getMultiple<D>(keys: Iterable<CacheKey>, defaultValue: D): Promise<Map<CacheKey, T | D>>

  set(key: CacheKey, value: T, ttl?: Ttl | null, dependency?: Dependency): Promise<boolean>

  setMultiple(
    entries: Iterable<CacheEntry<T>>,
    ttl?: Ttl | null,
    dependency?: Dependency,
  ): Promise<boolean>

  add(key: CacheKey, value: T, ttl?: Ttl | null, dependency?: Dependency): Promise<boolean>

  addMultiple(
    entries: Iterable<CacheEntry<T>>,
    ttl?: Ttl | null,
    dependency?: Dependency,
  ): Promise<boolean>

  delete(key: CacheKey): Promise<boolean>

  deleteMultiple(keys: Iterable<CacheKey>): Promise<boolean>

  clear(): Promise<boolean>

  getOrSet(
    key: CacheKey,
    compute: ComputeValue<T>,
    ttl?: Ttl | null,
    dependency?: Dependency,
  ): Promise<T>
}

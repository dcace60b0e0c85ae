import type { BackendEntry } from "./cache-entry"
import type { BackendKey } from "./cache-key"
import type { BackendTtl } from "./cache-ttl"

/**
 * CacheBackend is raw key-value storage underneath the cache facade.
 *
 * @remarks
 * - Keys arrive already normalized and prefixed; backends treat them as opaque.
 * - Values are opaque too. Backends must not inspect or transform them.
 * - Expiry, eviction and durability are the backend's business. The facade
 *   never retries a backend call or reinterprets its failures.
 */
export interface CacheBackend<T> {
  /**
   * Retrieve a stored value.
   *
   * @param key Normalized key.
   * @param defaultValue Returned when the key is absent or expired.
   */
  get<D>(key: BackendKey, defaultValue: D): Promise<T | D>

  /**
   * Check whether a live entry exists for the key.
   */
  has(key: BackendKey): Promise<boolean>

  /**
   * Store a value, replacing any existing entry and its expiry.
   *
   * @param ttl Seconds to live; `null` stores without expiry; zero or less
   * removes the key instead of storing.
   * @returns Whether the write succeeded.
   */
  set(key: BackendKey, value: T, ttl: BackendTtl): Promise<boolean>

  /**
   * Remove an entry. Removing an absent key succeeds.
   */
  delete(key: BackendKey): Promise<boolean>

  /**
   * Remove every entry the backend holds.
   */
  clear(): Promise<boolean>

  /**
   * Retrieve several values at once.
   *
   * @returns One map entry per requested key, in request order, holding the
   * stored value or `defaultValue`.
   */
  getMultiple<D>(keys: readonly BackendKey[], defaultValue: D): Promise<Map<BackendKey, T | D>>

  /**
   * Store several values with one shared TTL.
   */
  setMultiple(entries: readonly BackendEntry<T>[], ttl: BackendTtl): Promise<boolean>

  /**
   * Remove several entries.
   */
  deleteMultiple(keys: readonly BackendKey[]): Promise<boolean>
}

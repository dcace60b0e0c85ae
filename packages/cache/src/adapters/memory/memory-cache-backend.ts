import { EvictionStore } from "../../core/eviction/eviction-store"
import { type Clock, SystemClock } from "../../core/time/clock"
import type { BackendEntry } from "../../ports/cache-entry"
import type { CacheEvictionPolicy } from "../../ports/cache-eviction-policy"
import type { BackendKey } from "../../ports/cache-key"
import type { CacheBackend } from "../../ports/cache-backend"
import type { BackendTtl } from "../../ports/cache-ttl"
import type { Milliseconds } from "../../ports/time"

export const DEFAULT_MAX_ENTRIES = 10_000

export type MemoryCacheBackendOptions = {
  /**
   * Maximum number of entries retained.
   *
   * When a write would exceed it, entries are evicted according to
   * `evictionPolicy`.
   */
  maxEntries: number

  evictionPolicy: CacheEvictionPolicy
}

export type MemoryCacheBackendDeps = {
  clock: Clock
}

export type MemoryCacheEntry<T> = {
  value: T
  expiresAtMs?: Milliseconds
}

/**
 * In-process {@link CacheBackend}. Values are kept by reference, never copied.
 *
 * Expired entries are dropped when a read touches them, not in the background.
 */
export class MemoryCacheBackend<T> implements CacheBackend<T> {
  private readonly opts: MemoryCacheBackendOptions
  private readonly store: EvictionStore<BackendKey, MemoryCacheEntry<T>>

  constructor(
    private readonly deps: MemoryCacheBackendDeps = { clock: new SystemClock() },
    opts: Partial<MemoryCacheBackendOptions> = {},
  ) {
    this.opts = {
      maxEntries: opts.maxEntries ?? DEFAULT_MAX_ENTRIES,
      evictionPolicy: opts.evictionPolicy ?? "lru",
    }

    if (!Number.isInteger(this.opts.maxEntries) || this.opts.maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${this.opts.maxEntries}.`)
    }

    this.store = new EvictionStore(this.opts.evictionPolicy)
  }

  async get<D>(key: BackendKey, defaultValue: D): Promise<T | D> {
    const entry = this.liveEntry(key, true)

    return entry === undefined ? defaultValue : entry.value
  }

  async has(key: BackendKey): Promise<boolean> {
    return this.liveEntry(key, false) !== undefined
  }

  async set(key: BackendKey, value: T, ttl: BackendTtl): Promise<boolean> {
    if (isExpiredOnArrival(ttl)) {
      this.store.delete(key)
      return true
    }

    this.ensureCapacityFor(this.store.has(key) ? 0 : 1)
    this.store.set(key, this.createEntry(value, ttl))

    return true
  }

  async delete(key: BackendKey): Promise<boolean> {
    this.store.delete(key)

    return true
  }

  async clear(): Promise<boolean> {
    this.store.clear()

    return true
  }

  async getMultiple<D>(
    keys: readonly BackendKey[],
    defaultValue: D,
  ): Promise<Map<BackendKey, T | D>> {
    const out = new Map<BackendKey, T | D>()

    for (const key of keys) {
      const entry = this.liveEntry(key, true)
      out.set(key, entry === undefined ? defaultValue : entry.value)
    }

    return out
  }

  async setMultiple(entries: readonly BackendEntry<T>[], ttl: BackendTtl): Promise<boolean> {
    if (isExpiredOnArrival(ttl)) {
      for (const [key] of entries) this.store.delete(key)
      return true
    }

    this.ensureCapacityFor(this.countNewUniqueKeys(entries))

    for (const [key, value] of entries) {
      this.store.set(key, this.createEntry(value, ttl))
    }

    return true
  }

  async deleteMultiple(keys: readonly BackendKey[]): Promise<boolean> {
    for (const key of keys) this.store.delete(key)

    return true
  }

  /**
   * Number of entries held, expired ones not yet purged included.
   */
  size(): number {
    return this.store.size()
  }

  private createEntry(value: T, ttl: BackendTtl): MemoryCacheEntry<T> {
    if (ttl === null) return { value }

    return { value, expiresAtMs: this.deps.clock.nowMs() + ttl * 1000 }
  }

  private liveEntry(key: BackendKey, touch: boolean): MemoryCacheEntry<T> | undefined {
    const entry = touch ? this.store.get(key) : this.store.peek(key)

    if (entry === undefined) return undefined

    if (entry.expiresAtMs !== undefined && entry.expiresAtMs <= this.deps.clock.nowMs()) {
      this.store.delete(key)
      return undefined
    }

    return entry
  }

  private countNewUniqueKeys(entries: readonly BackendEntry<T>[]): number {
    const uniqueKeys = new Set<BackendKey>()

    for (const [key] of entries) {
      if (!this.store.has(key)) uniqueKeys.add(key)
    }

    return uniqueKeys.size
  }

  private ensureCapacityFor(spaceNeeded: number): void {
    if (spaceNeeded <= 0) return

    if (spaceNeeded > this.opts.maxEntries) {
      const { maxEntries } = this.opts

      throw new RangeError(
        `Cannot insert ${spaceNeeded} new entries into a cache with maxEntries=${maxEntries}.`,
      )
    }

    while (this.store.size() + spaceNeeded > this.opts.maxEntries) {
      const victim = this.store.victim()

      if (victim === undefined) {
        throw new Error("Invariant violation: eviction store is empty while over capacity")
      }

      this.store.delete(victim)
    }
  }
}

function isExpiredOnArrival(ttl: BackendTtl): boolean {
  return ttl !== null && ttl <= 0
}

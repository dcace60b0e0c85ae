import { type Logger, NullLogger } from "@layercache/logger"
import { InvalidConfigurationError, SetFailedError } from "../errors/errors"
import type { CacheInterface, ComputeValue } from "../ports/cache"
import type { CacheBackend } from "../ports/cache-backend"
import type { CacheEntry } from "../ports/cache-entry"
import type { BackendKey, CacheKey } from "../ports/cache-key"
import type { BackendTtl, Ttl } from "../ports/cache-ttl"
import type { Dependency } from "../ports/dependency"
import type { StoredEntry } from "../ports/stored-entry"
import { canonicalizeKey, normalizeKey } from "./key/key-normalizer"
import { normalizeTtl } from "./ttl/normalize-ttl"

/**
 * Asked of the backend in place of the caller's default, so that a default
 * can never be mistaken for a stored entry.
 */
const MISSING: unique symbol = Symbol("layercache.missing")

type Missing = typeof MISSING

const KEY_PREFIX_PATTERN = /^[A-Za-z0-9]*$/

export type CacheDeps<T> = {
  backend: CacheBackend<StoredEntry<T>>

  /** Defaults to a logger that discards everything. */
  logger?: Logger
}

export type CacheOptions = {
  /**
   * Prepended to every backend key, so several owners can share one backend.
   * Alphanumeric or empty.
   */
  keyPrefix: string

  /**
   * TTL for writes that do not give one. `null` stores without expiry.
   */
  defaultTtl: Ttl | null

  /**
   * When off, keys reach the backend as their plain string form (prefixed),
   * without hashing.
   */
  keyNormalization: boolean
}

/**
 * Cache is a decorator over a raw {@link CacheBackend}.
 *
 * It adds what backends lack:
 * - normalization of arbitrary keys into short, backend-safe strings
 * - TTL resolution, including a default TTL
 * - dependency-based invalidation: a value written with a {@link Dependency}
 *   reads as absent once that dependency reports a change
 *
 * @remarks
 * Every call runs `normalize → backend → unwrap` in sequence. There is no
 * locking, retry or single-flight: `add`/`addMultiple` check then write, and
 * concurrent `getOrSet` misses each run `compute`.
 *
 * @example
 * ```ts
 * const cache = new Cache<Product[]>({ backend }, { keyPrefix: "shop", defaultTtl: 600 })
 *
 * const top = await cache.getOrSet(["top-products", { n: 10 }], () => loadTopProducts(10))
 * ```
 */
export class Cache<T = unknown> implements CacheInterface<T> {
  private readonly backend: CacheBackend<StoredEntry<T>>
  private readonly logger: Logger
  private keyPrefix = ""
  private keyNormalization: boolean
  private defaultTtl: BackendTtl = null

  constructor(deps: CacheDeps<T>, opts: Partial<CacheOptions> = {}) {
    this.backend = deps.backend
    this.logger = (deps.logger ?? new NullLogger()).child({ module: "cache" })
    this.keyNormalization = opts.keyNormalization ?? true

    this.setKeyPrefix(opts.keyPrefix ?? "")
    this.setDefaultTtl(opts.defaultTtl ?? null)
  }

  get(key: CacheKey): Promise<T | undefined>
  get<D>(key: CacheKey, defaultValue: D): Promise<T | D>
  async get<D>(key: CacheKey, defaultValue?: D): Promise<T | D | undefined> {
    const backendKey = this.buildKey(key)
    const entry = await this.backend.get(backendKey, MISSING)

    return this.unwrap(backendKey, entry, defaultValue)
  }

  /**
   * Whether the backend holds an entry for the key.
   *
   * @remarks
   * Dependencies are not consulted: an entry whose dependency changed still
   * exists, so `has()` can be `true` while `get()` returns the default.
   */
  async has(key: CacheKey): Promise<boolean> {
    return this.backend.has(this.buildKey(key))
  }

  /**
   * Read several entries with one backend call.
   *
   * @returns A map keyed by the caller's own keys. If two keys normalize to
   * the same backend key, only the later one appears.
   */
  getMultiple(keys: Iterable<CacheKey>): Promise<Map<CacheKey, T | undefined>>
  getMultiple<D>(keys: Iterable<CacheKey>, defaultValue: D): Promise<Map<CacheKey, T | D>>
  async getMultiple<D>(
    keys: Iterable<CacheKey>,
    defaultValue?: D,
  ): Promise<Map<CacheKey, T | D | undefined>> {
    const keyMap = this.buildKeyMap(keys)
    const entries = await this.backend.getMultiple([...keyMap.keys()], MISSING)

    const out = new Map<CacheKey, T | D | undefined>()
    for (const [backendKey, entry] of entries) {
      const rawKey = keyMap.get(backendKey) ?? backendKey

      out.set(rawKey, await this.unwrap(backendKey, entry, defaultValue))
    }

    return out
  }

  /**
   * Store a value, replacing any existing entry.
   *
   * @param ttl Seconds or a span; falls back to the default TTL.
   * @param dependency Evaluated now unless it already was. The value reads as
   * absent once the dependency changes.
   * @returns The backend's success flag.
   */
  async set(
    key: CacheKey,
    value: T,
    ttl?: Ttl | null,
    dependency?: Dependency,
  ): Promise<boolean> {
    const backendKey = this.buildKey(key)
    const entry = await this.wrap(value, dependency)

    return this.backend.set(backendKey, entry, this.resolveTtl(ttl))
  }

  /**
   * Store several values with one backend call and one TTL. A shared
   * dependency is evaluated at most once for the whole batch.
   */
  async setMultiple(
    entries: Iterable<CacheEntry<T>>,
    ttl?: Ttl | null,
    dependency?: Dependency,
  ): Promise<boolean> {
    const prepared = await this.prepareEntries(entries, dependency)

    return this.backend.setMultiple([...prepared], this.resolveTtl(ttl))
  }

  /**
   * Store a value only if the backend has nothing under the key.
   *
   * @returns `false` without writing when the key exists.
   */
  async add(
    key: CacheKey,
    value: T,
    ttl?: Ttl | null,
    dependency?: Dependency,
  ): Promise<boolean> {
    const backendKey = this.buildKey(key)

    if (await this.backend.has(backendKey)) {
      this.logger.debug("add skipped, key exists", { key: backendKey })
      return false
    }

    const entry = await this.wrap(value, dependency)

    return this.backend.set(backendKey, entry, this.resolveTtl(ttl))
  }

  /**
   * Store the entries whose keys the backend does not hold yet.
   *
   * @returns The backend's success flag for the remaining entries. Skipped
   * entries are not reported.
   */
  async addMultiple(
    entries: Iterable<CacheEntry<T>>,
    ttl?: Ttl | null,
    dependency?: Dependency,
  ): Promise<boolean> {
    const prepared = await this.prepareEntries(entries, dependency)
    const existing = await this.backend.getMultiple([...prepared.keys()], MISSING)

    let skipped = 0
    for (const [backendKey, entry] of existing) {
      if (entry !== MISSING && prepared.delete(backendKey)) skipped++
    }

    if (skipped > 0) {
      this.logger.debug("addMultiple skipped existing keys", { skipped })
    }

    return this.backend.setMultiple([...prepared], this.resolveTtl(ttl))
  }

  async delete(key: CacheKey): Promise<boolean> {
    return this.backend.delete(this.buildKey(key))
  }

  async deleteMultiple(keys: Iterable<CacheKey>): Promise<boolean> {
    return this.backend.deleteMultiple([...this.buildKeyMap(keys).keys()])
  }

  /**
   * Empty the backend. Entries of other owners sharing it go too.
   */
  async clear(): Promise<boolean> {
    return this.backend.clear()
  }

  /**
   * Return the cached value, or compute, store and return it. A stored `null`
   * counts as absent and is recomputed.
   *
   * @throws {SetFailedError} when the backend refuses the computed value.
   */
  async getOrSet(
    key: CacheKey,
    compute: ComputeValue<T>,
    ttl?: Ttl | null,
    dependency?: Dependency,
  ): Promise<T> {
    const cached = await this.get(key)
    if (cached !== undefined && cached !== null) return cached

    const value = await compute(this)

    if (!(await this.set(key, value, ttl, dependency))) {
      this.logger.warn("backend refused computed value", { key: this.buildKey(key) })
      throw new SetFailedError(key, value, this)
    }

    return value
  }

  /**
   * The backend key a raw key maps to under the current prefix and
   * normalization setting.
   */
  buildKey(key: CacheKey): BackendKey {
    const body = this.keyNormalization ? normalizeKey(key) : canonicalizeKey(key)

    return `${this.keyPrefix}${body}`
  }

  enableKeyNormalization(): void {
    this.keyNormalization = true
  }

  disableKeyNormalization(): void {
    this.keyNormalization = false
  }

  isKeyNormalizationEnabled(): boolean {
    return this.keyNormalization
  }

  /**
   * @throws {InvalidConfigurationError} unless the prefix is alphanumeric or empty.
   */
  setKeyPrefix(keyPrefix: string): void {
    if (!KEY_PREFIX_PATTERN.test(keyPrefix)) {
      throw new InvalidConfigurationError("Cache key prefix must be alphanumeric", {
        keyPrefix,
      })
    }

    this.keyPrefix = keyPrefix
  }

  getKeyPrefix(): string {
    return this.keyPrefix
  }

  /**
   * The default TTL in seconds, or `null` for no expiry.
   */
  getDefaultTtl(): BackendTtl {
    return this.defaultTtl
  }

  setDefaultTtl(defaultTtl: Ttl | null): void {
    this.defaultTtl = normalizeTtl(defaultTtl, null)
  }

  private resolveTtl(ttl: Ttl | null | undefined): BackendTtl {
    return normalizeTtl(ttl, this.defaultTtl)
  }

  private async wrap(value: T, dependency: Dependency | undefined): Promise<StoredEntry<T>> {
    if (dependency === undefined) return { kind: "plain", value }

    if (!dependency.isEvaluated()) {
      await dependency.evaluateDependency(this)
    }

    return { kind: "tagged", value, dependency }
  }

  private async unwrap<D>(
    backendKey: BackendKey,
    entry: StoredEntry<T> | Missing,
    defaultValue: D,
  ): Promise<T | D> {
    if (entry === MISSING) return defaultValue

    if (entry.kind === "tagged" && (await entry.dependency.isChanged(this))) {
      this.logger.debug("dependency changed, entry treated as absent", { key: backendKey })
      return defaultValue
    }

    return entry.value
  }

  /**
   * `backend key → raw key`; a later raw key replaces an earlier one that
   * normalizes the same.
   */
  private buildKeyMap(keys: Iterable<CacheKey>): Map<BackendKey, CacheKey> {
    const keyMap = new Map<BackendKey, CacheKey>()

    for (const key of keys) {
      keyMap.set(this.buildKey(key), key)
    }

    return keyMap
  }

  private async prepareEntries(
    entries: Iterable<CacheEntry<T>>,
    dependency: Dependency | undefined,
  ): Promise<Map<BackendKey, StoredEntry<T>>> {
    const prepared = new Map<BackendKey, StoredEntry<T>>()

    for (const [key, value] of entries) {
      const backendKey = this.buildKey(key)
      prepared.set(backendKey, await this.wrap(value, dependency))
    }

    return prepared
  }
}

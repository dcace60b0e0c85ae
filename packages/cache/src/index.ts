export { DEFAULT_MAX_ENTRIES, MemoryCacheBackend } from "./adapters/memory/memory-cache-backend"
export type {
  MemoryCacheBackendDeps,
  MemoryCacheBackendOptions,
  MemoryCacheEntry,
} from "./adapters/memory/memory-cache-backend"
export {
  type CacheConfig,
  type CacheEnv,
  cacheEnvSchema,
  type LoadCacheConfigOptions,
  loadCacheConfig,
  mapEnvToConfig,
} from "./config/cache-config"
export { Config } from "./config/config"
export { type LoadConfigOptions, loadConfig } from "./config/load-config"
export type { IConfig } from "./config/ports/config"
export type { ConfigSource } from "./config/ports/config-source"
export { DotenvSource, type DotenvSourceOptions } from "./config/sources/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./config/sources/env-source"
export { ObjectSource } from "./config/sources/object-source"
export { Cache, type CacheDeps, type CacheOptions } from "./core/cache"
export { AllDependencies } from "./core/dependency/all-dependencies"
export { AnyDependency } from "./core/dependency/any-dependency"
export { CallbackDependency, type SnapshotCallback } from "./core/dependency/callback-dependency"
export { FileDependency, type FileDependencyOptions } from "./core/dependency/file-dependency"
export { SnapshotDependency } from "./core/dependency/snapshot-dependency"
export { TagDependency } from "./core/dependency/tag-dependency"
export { EvictionStore } from "./core/eviction/eviction-store"
export { toCanonicalJson } from "./core/key/canonical-json"
export { canonicalizeKey, KeyNormalizer, normalizeKey } from "./core/key/key-normalizer"
export { type Clock, SystemClock } from "./core/time/clock"
export { normalizeTtl, spanToSeconds } from "./core/ttl/normalize-ttl"
export { type CreateCacheDeps, createCache } from "./create-cache"
export {
  CacheError,
  type CacheErrorOptions,
  type ErrorCode,
  type ErrorContext,
  type SerializedError,
  type SerializeOptions,
  serializeError,
} from "./errors/cache-error"
export { InvalidConfigurationError, InvalidKeyError, SetFailedError } from "./errors/errors"
export { isCacheError } from "./errors/is-cache-error"
export type { CacheInterface, ComputeValue } from "./ports/cache"
export type { CacheBackend } from "./ports/cache-backend"
export type { BackendEntry, CacheEntry } from "./ports/cache-entry"
export { type CacheEvictionPolicy, cacheEvictionPolicies } from "./ports/cache-eviction-policy"
export type { BackendKey, CacheKey, CompositeCacheKey } from "./ports/cache-key"
export type { BackendTtl, Ttl, TtlSpan } from "./ports/cache-ttl"
export type { Dependency } from "./ports/dependency"
export type { PlainEntry, StoredEntry, TaggedEntry } from "./ports/stored-entry"
export type { Milliseconds, Seconds } from "./ports/time"

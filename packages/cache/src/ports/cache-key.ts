/**
 * A composite key: an ordered list or a plain record of serializable values.
 *
 * @example
 * ```ts
 * const key: CacheKey = ["top-products", { n: 10, locale: "en" }]
 * ```
 */
export type CompositeCacheKey = readonly unknown[] | Readonly<Record<string, unknown>>

/**
 * Anything a caller may use to identify a cache entry.
 *
 * @remarks
 * Raw keys never reach a backend directly. The facade turns each one into a
 * {@link BackendKey} first.
 */
export type CacheKey = string | number | bigint | CompositeCacheKey

/**
 * A prefixed, backend-safe string derived from a {@link CacheKey}.
 */
export type BackendKey = string

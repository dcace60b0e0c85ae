/**
 * Validated configuration together with where each value came from.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: cacheEnvSchema,
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.value.CACHE_MAX_ENTRIES       // 10000
 * config.explain("CACHE_MAX_ENTRIES")  // "default"
 * config.explain("CACHE_KEY_PREFIX")   // "dotenv:.env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: Readonly<T>

  /**
   * Name of the source that provided the final value, or `"default"` when the
   * schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /**
   * Sources that provided at least one value, in the order they were applied.
   */
  sourcesUsed(): string[]

  /**
   * Keys some source provided that the schema does not know. Useful for
   * spotting typos.
   */
  unknownKeys(): string[]
}

/**
 * A source of raw configuration values.
 *
 * Sources only load. Validation, coercion and merging happen in
 * {@link loadConfig}, which applies sources in order so that later ones
 * override earlier ones.
 */
export interface ConfigSource {
  /**
   * Shown by {@link IConfig.explain}, e.g. `"env"` or `"dotenv:.env"`.
   */
  readonly name: string

  /**
   * Env-like sources return flat string values. A key mapped to `undefined`
   * counts as not provided.
   */
  load(): Promise<Record<string, unknown>>
}

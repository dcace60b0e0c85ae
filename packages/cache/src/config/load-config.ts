import { type ZodType, z } from "zod"
import { InvalidConfigurationError } from "../errors/errors"
import { Config } from "./config"
import type { IConfig } from "./ports/config"
import type { ConfigSource } from "./ports/config-source"
import { EnvSource } from "./sources/env-source"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>

  /** Applied in order. Defaults to the process environment only. */
  sources?: readonly ConfigSource[]
}

/**
 * Merge the sources, then validate the result against the schema.
 *
 * @throws {InvalidConfigurationError} listing every issue zod found.
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources = [new EnvSource()],
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance = new Map<string, string>()

  for (const source of sources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance.set(key, source.name)
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new InvalidConfigurationError(
      `Configuration validation failed:\n${z.prettifyError(result.error)}`,
      { sources: sources.map((source) => source.name) },
    )
  }

  return new Config(
    result.data,
    provenance,
    new Set(Object.keys(merged)),
    sources.map((source) => source.name),
  )
}

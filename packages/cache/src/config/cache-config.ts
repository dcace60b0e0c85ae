import { type LogLevelName, logLevelNames } from "@layercache/logger"
import { z } from "zod"
import { type CacheEvictionPolicy, cacheEvictionPolicies } from "../ports/cache-eviction-policy"
import type { Seconds } from "../ports/time"
import { loadConfig } from "./load-config"
import type { ConfigSource } from "./ports/config-source"
import { DotenvSource } from "./sources/dotenv-source"
import { EnvSource } from "./sources/env-source"
import { ObjectSource } from "./sources/object-source"

/** Accepts real booleans from code and "true"/"false"/"1"/"0"/… from the environment. */
const flag = z.union([z.boolean(), z.stringbool()])

export const cacheEnvSchema = z.object({
  SERVICE_NAME: z.string().min(1).default("layercache"),

  CACHE_KEY_PREFIX: z
    .string()
    .regex(/^[A-Za-z0-9]*$/, "must contain only letters and digits")
    .default(""),
  CACHE_DEFAULT_TTL: z.coerce.number().int().optional(),
  CACHE_KEY_NORMALIZATION: flag.default(true),

  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(10_000),
  CACHE_EVICTION_POLICY: z.enum(cacheEvictionPolicies).default("lru"),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: flag.default(false),
})

export type CacheEnv = z.infer<typeof cacheEnvSchema>

export type CacheConfig = {
  service: {
    name: string
  }
  cache: {
    keyPrefix: string
    /** `null` = entries never expire unless a write says otherwise. */
    defaultTtl: Seconds | null
    keyNormalization: boolean
  }
  memory: {
    maxEntries: number
    evictionPolicy: CacheEvictionPolicy
  }
  logging: {
    level: LogLevelName
    prettify: boolean
  }
}

export type LoadCacheConfigOptions = {
  /** Values applied after every other source, keyed like the environment. */
  overrides?: Partial<Record<keyof CacheEnv, string | number | boolean>>

  /** Optional dotenv file read before the environment. @default ".env" */
  dotenvFile?: string

  /** @default process.cwd() */
  cwd?: string
}

export function mapEnvToConfig(env: CacheEnv): CacheConfig {
  return {
    service: {
      name: env.SERVICE_NAME,
    },
    cache: {
      keyPrefix: env.CACHE_KEY_PREFIX,
      defaultTtl: env.CACHE_DEFAULT_TTL ?? null,
      keyNormalization: env.CACHE_KEY_NORMALIZATION,
    },
    memory: {
      maxEntries: env.CACHE_MAX_ENTRIES,
      evictionPolicy: env.CACHE_EVICTION_POLICY,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
  }
}

/**
 * Load the cache configuration from a dotenv file (if present), the
 * environment, then `overrides`, in that order of precedence.
 *
 * @throws {InvalidConfigurationError} when a value fails validation.
 */
export async function loadCacheConfig(
  env: Record<string, string | undefined>,
  opts: LoadCacheConfigOptions = {},
): Promise<CacheConfig> {
  const sources: ConfigSource[] = [
    new DotenvSource({
      file: opts.dotenvFile ?? ".env",
      required: false,
      ...(opts.cwd !== undefined && { cwd: opts.cwd }),
    }),
    new EnvSource({ env }),
  ]

  if (opts.overrides) sources.push(new ObjectSource(opts.overrides))

  const result = await loadConfig({ schema: cacheEnvSchema, sources })

  return mapEnvToConfig(result.value)
}

import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { InvalidConfigurationError } from "../../errors/errors"
import { type CacheConfig, loadCacheConfig } from "../cache-config"

const defaults: CacheConfig = {
  service: { name: "layercache" },
  cache: { keyPrefix: "", defaultTtl: null, keyNormalization: true },
  memory: { maxEntries: 10_000, evictionPolicy: "lru" },
  logging: { level: "info", prettify: false },
}

describe("loadCacheConfig", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "cache-config-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("uses defaults for an empty environment", async () => {
    await expect(loadCacheConfig({}, { cwd })).resolves.toEqual(defaults)
  })

  it("maps environment variables into the nested config", async () => {
    const config = await loadCacheConfig(
      {
        SERVICE_NAME: "catalog",
        CACHE_KEY_PREFIX: "shop",
        CACHE_DEFAULT_TTL: "300",
        CACHE_KEY_NORMALIZATION: "false",
        CACHE_MAX_ENTRIES: "50",
        CACHE_EVICTION_POLICY: "fifo",
        LOG_LEVEL: "debug",
        LOG_PRETTY: "true",
        PATH: "/usr/bin",
      },
      { cwd },
    )

    expect(config).toEqual({
      service: { name: "catalog" },
      cache: { keyPrefix: "shop", defaultTtl: 300, keyNormalization: false },
      memory: { maxEntries: 50, evictionPolicy: "fifo" },
      logging: { level: "debug", prettify: true },
    })
  })

  it("reads .env first, then the environment, then overrides", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "CACHE_KEY_PREFIX=fromfile\nCACHE_MAX_ENTRIES=20\nCACHE_DEFAULT_TTL=90\n",
    )

    const config = await loadCacheConfig(
      { CACHE_KEY_PREFIX: "fromenv" },
      { cwd, overrides: { CACHE_MAX_ENTRIES: 5, CACHE_KEY_NORMALIZATION: false } },
    )

    expect(config.cache).toEqual({ keyPrefix: "fromenv", defaultTtl: 90, keyNormalization: false })
    expect(config.memory.maxEntries).toBe(5)
  })

  it("reads another dotenv file when asked", async () => {
    await fs.writeFile(path.join(cwd, ".env.test"), "LOG_LEVEL=warn\n")

    const config = await loadCacheConfig({}, { cwd, dotenvFile: ".env.test" })

    expect(config.logging.level).toBe("warn")
  })

  it.each([
    ["CACHE_KEY_PREFIX", "app_"],
    ["CACHE_EVICTION_POLICY", "random"],
    ["CACHE_MAX_ENTRIES", "0"],
    ["CACHE_DEFAULT_TTL", "ten"],
    ["CACHE_KEY_NORMALIZATION", "maybe"],
    ["LOG_LEVEL", "verbose"],
  ])("rejects %s=%s", async (key, value) => {
    const loading = loadCacheConfig({ [key]: value }, { cwd })

    await expect(loading).rejects.toBeInstanceOf(InvalidConfigurationError)
    await expect(loading).rejects.toThrow(key)
  })
})

import type { Logger } from "@layercache/logger"
import { mock } from "vitest-mock-extended"
import type { CacheConfig } from "../config/cache-config"
import { Cache } from "../core/cache"
import { createCache } from "../create-cache"
import { ManualTestClock } from "../tests/utils/manual-test-clock"

const config: CacheConfig = {
  service: { name: "catalog" },
  cache: { keyPrefix: "shop", defaultTtl: 30, keyNormalization: false },
  memory: { maxEntries: 2, evictionPolicy: "fifo" },
  logging: { level: "error", prettify: false },
}

describe("createCache", () => {
  it("applies the facade settings", () => {
    const cache = createCache(config, { logger: mock<Logger>() })

    expect(cache).toBeInstanceOf(Cache)
    expect(cache.getKeyPrefix()).toBe("shop")
    expect(cache.getDefaultTtl()).toBe(30)
    expect(cache.isKeyNormalizationEnabled()).toBe(false)
  })

  it("wires a memory backend with the configured capacity, policy and clock", async () => {
    const clock = new ManualTestClock(new Date("2024-01-01T00:00:00.000Z"))
    const cache = createCache<string>(config, { logger: mock<Logger>(), clock })

    await cache.set("a", "1")
    await cache.set("b", "2")
    await cache.get("a")
    await cache.set("c", "3")

    await expect(cache.get("a")).resolves.toBeUndefined()
    await expect(cache.get("b")).resolves.toBe("2")

    clock.advanceSeconds(30)

    await expect(cache.get("b")).resolves.toBeUndefined()
  })

  it("builds a pino logger when none is given", async () => {
    const cache = createCache<string>(config)

    await cache.set("k", "v")

    await expect(cache.get("k")).resolves.toBe("v")
  })
})

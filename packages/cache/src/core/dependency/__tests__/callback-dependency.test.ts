import type { CacheInterface } from "../../../ports/cache"
import { createTestCache } from "../../../tests/utils/create-test-cache"
import { CallbackDependency } from "../callback-dependency"

describe("CallbackDependency", () => {
  let cache: CacheInterface

  beforeEach(() => {
    cache = createTestCache().cache
  })

  it("is not evaluated until evaluateDependency runs", async () => {
    const dependency = new CallbackDependency(() => 1)

    expect(dependency.isEvaluated()).toBe(false)

    await dependency.evaluateDependency(cache)

    expect(dependency.isEvaluated()).toBe(true)
  })

  it("reports changed when it was never evaluated", async () => {
    const dependency = new CallbackDependency(() => 1)

    await expect(dependency.isChanged(cache)).resolves.toBe(true)
  })

  it("keeps the first snapshot when evaluated again", async () => {
    const snapshot = vi.fn(() => 1)
    const dependency = new CallbackDependency(snapshot)

    await dependency.evaluateDependency(cache)
    await dependency.evaluateDependency(cache)

    expect(snapshot).toHaveBeenCalledTimes(1)
  })

  it("compares snapshots structurally", async () => {
    let state = { tags: ["a", "b"], owner: { id: 1 } }
    const dependency = new CallbackDependency(() => state)

    await dependency.evaluateDependency(cache)
    state = { tags: ["a", "b"], owner: { id: 1 } }

    await expect(dependency.isChanged(cache)).resolves.toBe(false)

    state = { tags: ["a", "b"], owner: { id: 2 } }

    await expect(dependency.isChanged(cache)).resolves.toBe(true)
  })

  it("awaits asynchronous callbacks and passes them the cache", async () => {
    const snapshot = vi.fn(async (_cache: CacheInterface) => "v1")
    const dependency = new CallbackDependency(snapshot)

    await dependency.evaluateDependency(cache)

    expect(snapshot).toHaveBeenCalledWith(cache)
    await expect(dependency.isChanged(cache)).resolves.toBe(false)
  })

  it("can read the cache it is evaluated against", async () => {
    await cache.set("revision", 1)
    const dependency = new CallbackDependency((c) => c.get("revision"))

    await dependency.evaluateDependency(cache)
    await cache.set("revision", 2)

    await expect(dependency.isChanged(cache)).resolves.toBe(true)
  })
})

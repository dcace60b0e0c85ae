import { EvictionStore } from "../eviction-store"

describe("EvictionStore", () => {
  describe.each(["lru", "fifo"] as const)("%s basics", (policy) => {
    let store: EvictionStore<string, number>

    beforeEach(() => {
      store = new EvictionStore(policy)
    })

    it("starts empty", () => {
      expect(store.size()).toBe(0)
      expect(store.victim()).toBeUndefined()
      expect(store.get("missing")).toBeUndefined()
    })

    it("stores, overwrites and deletes", () => {
      store.set("a", 1)
      store.set("a", 2)

      expect(store.get("a")).toBe(2)
      expect(store.size()).toBe(1)
      expect(store.delete("a")).toBe(true)
      expect(store.delete("a")).toBe(false)
      expect(store.has("a")).toBe(false)
    })

    it("picks the first insert as victim when nothing was read", () => {
      store.set("a", 1)
      store.set("b", 2)

      expect(store.victim()).toBe("a")
    })

    it("does not reorder on peek", () => {
      store.set("a", 1)
      store.set("b", 2)

      expect(store.peek("a")).toBe(1)
      expect(store.victim()).toBe("a")
    })

    it("clears", () => {
      store.set("a", 1)
      store.clear()

      expect(store.size()).toBe(0)
    })
  })

  it("lru moves a read key to the back", () => {
    const store = new EvictionStore<string, number>("lru")
    store.set("a", 1)
    store.set("b", 2)

    store.get("a")

    expect(store.victim()).toBe("b")
  })

  it("lru moves a rewritten key to the back", () => {
    const store = new EvictionStore<string, number>("lru")
    store.set("a", 1)
    store.set("b", 2)

    store.set("a", 3)

    expect(store.victim()).toBe("b")
  })

  it("fifo keeps insertion order on read and rewrite", () => {
    const store = new EvictionStore<string, number>("fifo")
    store.set("a", 1)
    store.set("b", 2)

    store.get("a")
    store.set("a", 3)

    expect(store.victim()).toBe("a")
    expect(store.get("a")).toBe(3)
  })
})

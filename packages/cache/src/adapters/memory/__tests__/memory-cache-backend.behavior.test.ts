import { ManualTestClock } from "../../../tests/utils/manual-test-clock"
import { DEFAULT_MAX_ENTRIES, MemoryCacheBackend } from "../memory-cache-backend"

const MISSING = Symbol("missing")

describe("MemoryCacheBackend", () => {
  let clock: ManualTestClock

  beforeEach(() => {
    clock = new ManualTestClock(new Date("2020-01-01T00:00:00.000Z"))
  })

  describe("TTL", () => {
    let backend: MemoryCacheBackend<string>

    beforeEach(() => {
      backend = new MemoryCacheBackend({ clock }, { maxEntries: 10 })
    })

    it("expires entries by the injected clock", async () => {
      await backend.set("k", "v", 5)

      clock.advanceMs(4999)
      await expect(backend.get("k", MISSING)).resolves.toBe("v")

      clock.advanceMs(1)
      await expect(backend.get("k", MISSING)).resolves.toBe(MISSING)
    })

    it("applies a batch TTL to every entry", async () => {
      await backend.setMultiple(
        [
          ["a", "1"],
          ["b", "2"],
        ],
        10,
      )

      clock.advanceSeconds(10)

      const result = await backend.getMultiple(["a", "b"], MISSING)
      expect([...result.values()]).toStrictEqual([MISSING, MISSING])
    })

    it("drops the old expiry when a key is rewritten without TTL", async () => {
      await backend.set("k", "v1", 5)
      await backend.set("k", "v2", null)

      clock.advanceSeconds(60)

      await expect(backend.get("k", MISSING)).resolves.toBe("v2")
    })

    it("reports expired entries as absent from has()", async () => {
      await backend.set("k", "v", 1)

      clock.advanceSeconds(1)

      await expect(backend.has("k")).resolves.toBe(false)
    })

    it("purges an expired entry when it is read", async () => {
      await backend.set("k", "v", 1)
      clock.advanceSeconds(2)

      expect(backend.size()).toBe(1)

      await backend.get("k", MISSING)

      expect(backend.size()).toBe(0)
    })

    it("deletes every entry of a batch written with a TTL of zero", async () => {
      await backend.set("a", "1", null)

      await backend.setMultiple([["a", "2"]], 0)

      await expect(backend.has("a")).resolves.toBe(false)
    })

    it("keeps values by reference", async () => {
      const objects = new MemoryCacheBackend<{ n: number }>({ clock })
      const value = { n: 1 }

      await objects.set("k", value, null)

      await expect(objects.get("k", MISSING)).resolves.toBe(value)
    })
  })

  describe("capacity", () => {
    it("evicts the least recently used entry under lru", async () => {
      const backend = new MemoryCacheBackend<string>({ clock }, { maxEntries: 2 })

      await backend.set("a", "1", null)
      await backend.set("b", "2", null)
      await backend.get("a", MISSING)
      await backend.set("c", "3", null)

      await expect(backend.has("a")).resolves.toBe(true)
      await expect(backend.has("b")).resolves.toBe(false)
      await expect(backend.has("c")).resolves.toBe(true)
    })

    it("evicts the oldest insert under fifo, whatever was read", async () => {
      const backend = new MemoryCacheBackend<string>(
        { clock },
        { maxEntries: 2, evictionPolicy: "fifo" },
      )

      await backend.set("a", "1", null)
      await backend.set("b", "2", null)
      await backend.get("a", MISSING)
      await backend.set("c", "3", null)

      await expect(backend.has("a")).resolves.toBe(false)
      await expect(backend.has("b")).resolves.toBe(true)
    })

    it("does not count has() as a use", async () => {
      const backend = new MemoryCacheBackend<string>({ clock }, { maxEntries: 2 })

      await backend.set("a", "1", null)
      await backend.set("b", "2", null)
      await backend.has("a")
      await backend.set("c", "3", null)

      await expect(backend.has("a")).resolves.toBe(false)
    })

    it("does not evict when overwriting an existing key at capacity", async () => {
      const backend = new MemoryCacheBackend<string>({ clock }, { maxEntries: 2 })

      await backend.set("a", "1", null)
      await backend.set("b", "2", null)
      await backend.set("a", "1b", null)

      expect(backend.size()).toBe(2)
      await expect(backend.get("b", MISSING)).resolves.toBe("2")
    })

    it("evicts enough entries for a whole batch", async () => {
      const backend = new MemoryCacheBackend<string>({ clock }, { maxEntries: 3 })

      await backend.setMultiple(
        [
          ["a", "1"],
          ["b", "2"],
          ["c", "3"],
        ],
        null,
      )
      await backend.setMultiple(
        [
          ["d", "4"],
          ["e", "5"],
        ],
        null,
      )

      const result = await backend.getMultiple(["a", "b", "c", "d", "e"], MISSING)
      expect([...result.values()]).toStrictEqual([MISSING, MISSING, "3", "4", "5"])
    })

    it("rejects a batch that needs more new slots than maxEntries, writing nothing", async () => {
      const backend = new MemoryCacheBackend<string>({ clock }, { maxEntries: 2 })
      await backend.set("a", "1", null)

      await expect(
        backend.setMultiple(
          [
            ["x", "1"],
            ["y", "2"],
            ["z", "3"],
          ],
          null,
        ),
      ).rejects.toThrow(
        new RangeError("Cannot insert 3 new entries into a cache with maxEntries=2."),
      )

      expect(backend.size()).toBe(1)
    })

    it("counts a key repeated in a batch once", async () => {
      const backend = new MemoryCacheBackend<string>({ clock }, { maxEntries: 1 })

      await expect(
        backend.setMultiple(
          [
            ["a", "1"],
            ["a", "2"],
          ],
          null,
        ),
      ).resolves.toBe(true)
    })
  })

  describe("options", () => {
    it("defaults to lru with the default capacity", () => {
      const backend = new MemoryCacheBackend<string>()

      expect(backend.size()).toBe(0)
      expect(DEFAULT_MAX_ENTRIES).toBe(10_000)
    })

    it.each([0, -1, 1.5])("rejects maxEntries=%s", (maxEntries) => {
      expect(() => new MemoryCacheBackend<string>({ clock }, { maxEntries })).toThrow(RangeError)
    })
  })
})

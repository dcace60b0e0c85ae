import type { CacheEvictionPolicy } from "../../ports/cache-eviction-policy"

/**
 * Map that remembers the order its policy evicts in.
 *
 * A JS `Map` iterates in insertion order, so the first key is always the
 * victim. Under `"lru"` a touched key is moved to the end by re-inserting it;
 * under `"fifo"` only a fresh insert moves a key.
 */
export class EvictionStore<K, V> {
  private readonly map = new Map<K, V>()

  constructor(readonly policy: CacheEvictionPolicy) {}

  /**
   * Read a value, counting it as a use.
   */
  get(key: K): V | undefined {
    const value = this.map.get(key)

    if (value !== undefined && this.policy === "lru") {
      this.map.delete(key)
      this.map.set(key, value)
    }

    return value
  }

  /**
   * Read a value without affecting eviction order.
   */
  peek(key: K): V | undefined {
    return this.map.get(key)
  }

  set(key: K, value: V): void {
    if (this.policy === "lru") this.map.delete(key)

    this.map.set(key, value)
  }

  delete(key: K): boolean {
    return this.map.delete(key)
  }

  has(key: K): boolean {
    return this.map.has(key)
  }

  size(): number {
    return this.map.size
  }

  clear(): void {
    this.map.clear()
  }

  /**
   * The key that goes next, or `undefined` when empty.
   */
  victim(): K | undefined {
    for (const key of this.map.keys()) return key

    return undefined
  }
}

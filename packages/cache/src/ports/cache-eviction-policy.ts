/**
 * How a bounded backend picks the entry to drop when it is full.
 *
 * - `"lru"`: the least recently read or written entry
 * - `"fifo"`: the oldest inserted entry; reads do not matter
 */
export type CacheEvictionPolicy = "lru" | "fifo"

export const cacheEvictionPolicies = [
  "lru",
  "fifo",
] as const satisfies readonly CacheEvictionPolicy[]

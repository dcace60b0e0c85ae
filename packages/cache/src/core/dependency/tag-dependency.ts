import type { CacheInterface } from "../../ports/cache"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { Milliseconds } from "../../ports/time"
import { type Clock, SystemClock } from "../time/clock"
import { SnapshotDependency } from "./snapshot-dependency"

const TAG_NAMESPACE = "layercache:tag"

type TagVersions = Record<string, number>

/**
 * Depends on the version counters of one or more tags, kept in the cache
 * itself. {@link TagDependency.invalidate} bumps the counters, which turns
 * every value stored with any of those tags stale at once.
 *
 * @remarks
 * A tag without a counter gets one on first use, seeded from the clock so
 * that a counter lost to eviction never comes back with an old value.
 *
 * @example
 * ```ts
 * await cache.set(["post", id], post, 3600, new TagDependency(["posts", `user-${authorId}`]))
 *
 * // later, after the author changes
 * await TagDependency.invalidate(cache, `user-${authorId}`)
 * ```
 */
export class TagDependency extends SnapshotDependency<TagVersions> {
  private readonly tags: readonly string[]

  constructor(
    tags: string | readonly string[],
    private readonly clock: Clock = new SystemClock(),
  ) {
    super()
    this.tags = typeof tags === "string" ? [tags] : [...tags]
  }

  protected async generateSnapshot(cache: CacheInterface): Promise<TagVersions> {
    const versions = await readVersions(cache, this.tags)
    const seeded: [string, number][] = []

    for (const tag of this.tags) {
      if (versions.has(tag)) continue

      const version = this.clock.nowMs()
      versions.set(tag, version)
      seeded.push([tag, version])
    }

    if (seeded.length > 0) {
      await writeVersions(cache, seeded)
    }

    return Object.fromEntries(this.tags.map((tag) => [tag, versions.get(tag) ?? 0]))
  }

  /**
   * Mark every value that depends on one of `tags` as changed.
   */
  static async invalidate(
    cache: CacheInterface,
    tags: string | readonly string[],
    clock: Clock = new SystemClock(),
  ): Promise<void> {
    const list = typeof tags === "string" ? [tags] : tags
    const current = await readVersions(cache, list)
    const now: Milliseconds = clock.nowMs()

    await writeVersions(
      cache,
      list.map((tag) => [tag, Math.max(now, (current.get(tag) ?? 0) + 1)] as const),
    )
  }
}

function tagKey(tag: string): CacheKey {
  return [TAG_NAMESPACE, tag]
}

async function readVersions(
  cache: CacheInterface,
  tags: readonly string[],
): Promise<Map<string, number>> {
  const keys = new Map(tags.map((tag) => [tagKey(tag), tag] as const))
  const stored = await cache.getMultiple(keys.keys())
  const versions = new Map<string, number>()

  for (const [key, value] of stored) {
    const tag = keys.get(key)
    if (tag !== undefined && typeof value === "number") versions.set(tag, value)
  }

  return versions
}

async function writeVersions(
  cache: CacheInterface,
  versions: readonly (readonly [string, number])[],
): Promise<void> {
  const entries: CacheEntry<unknown>[] = versions.map(
    ([tag, version]) => [tagKey(tag), version] as const,
  )

  await cache.setMultiple(entries)
}

import type { CacheInterface } from "../../ports/cache"
import { SnapshotDependency } from "./snapshot-dependency"

export type SnapshotCallback<S> = (cache: CacheInterface) => S | Promise<S>

/**
 * Depends on whatever a callback returns.
 *
 * @example
 * ```ts
 * const dependency = new CallbackDependency(() => settings.revision)
 * await cache.set("settings", rendered, null, dependency)
 * ```
 */
export class CallbackDependency<S> extends SnapshotDependency<S> {
  constructor(private readonly callback: SnapshotCallback<S>) {
    super()
  }

  protected generateSnapshot(cache: CacheInterface): S | Promise<S> {
    return this.callback(cache)
  }
}

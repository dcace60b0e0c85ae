import { isDeepStrictEqual } from "node:util"
import type { CacheInterface } from "../../ports/cache"
import type { Dependency } from "../../ports/dependency"

type Snapshot<S> = { readonly value: S }

/**
 * Evaluation bookkeeping shared by dependencies that compare a snapshot of
 * some external state. Subclasses only say how to take the snapshot.
 *
 * @remarks
 * Snapshots are compared by deep structural equality. A dependency that was
 * never evaluated always reports itself as changed.
 */
export abstract class SnapshotDependency<S> implements Dependency {
  private snapshot: Snapshot<S> | undefined

  isEvaluated(): boolean {
    return this.snapshot !== undefined
  }

  async evaluateDependency(cache: CacheInterface): Promise<void> {
    if (this.snapshot !== undefined) return

    this.snapshot = { value: await this.generateSnapshot(cache) }
  }

  async isChanged(cache: CacheInterface): Promise<boolean> {
    if (this.snapshot === undefined) return true

    const current = await this.generateSnapshot(cache)

    return !isDeepStrictEqual(this.snapshot.value, current)
  }

  protected abstract generateSnapshot(cache: CacheInterface): S | Promise<S>
}

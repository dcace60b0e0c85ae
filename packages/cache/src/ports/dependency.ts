import type { CacheInterface } from "./cache"

/**
 * A condition a cached value depends on.
 *
 * @remarks
 * On write the facade evaluates the dependency (once per instance) and stores
 * it next to the value. On read it asks {@link Dependency.isChanged}; a changed
 * dependency makes the value read as absent.
 *
 * Instances belong to the caller and keep their snapshot across calls. First
 * evaluation is not guarded against concurrent callers.
 */
export interface Dependency {
  /**
   * Whether a snapshot has been taken.
   */
  isEvaluated(): boolean

  /**
   * Snapshot the current state. Does nothing once evaluated.
   */
  evaluateDependency(cache: CacheInterface): Promise<void>

  /**
   * Compare the current state against the stored snapshot.
   */
  isChanged(cache: CacheInterface): Promise<boolean>
}

import type { CacheInterface } from "../../ports/cache"
import type { Dependency } from "../../ports/dependency"
import { evaluateChildren } from "./any-dependency"

/**
 * Changed only once every one of its children changed. With no children it
 * never changes.
 */
export class AllDependencies implements Dependency {
  constructor(private readonly dependencies: readonly Dependency[]) {}

  isEvaluated(): boolean {
    return this.dependencies.every((d) => d.isEvaluated())
  }

  async evaluateDependency(cache: CacheInterface): Promise<void> {
    await evaluateChildren(this.dependencies, cache)
  }

  async isChanged(cache: CacheInterface): Promise<boolean> {
    if (this.dependencies.length === 0) return false

    for (const dependency of this.dependencies) {
      if (!(await dependency.isChanged(cache))) return false
    }

    return true
  }
}

import type { CacheInterface } from "../../ports/cache"
import type { Dependency } from "../../ports/dependency"

/**
 * Changed as soon as any one of its children changed.
 */
export class AnyDependency implements Dependency {
  constructor(private readonly dependencies: readonly Dependency[]) {}

  isEvaluated(): boolean {
    return this.dependencies.every((d) => d.isEvaluated())
  }

  async evaluateDependency(cache: CacheInterface): Promise<void> {
    await evaluateChildren(this.dependencies, cache)
  }

  async isChanged(cache: CacheInterface): Promise<boolean> {
    for (const dependency of this.dependencies) {
      if (await dependency.isChanged(cache)) return true
    }

    return false
  }
}

/**
 * Evaluate, one after another, every child not evaluated yet.
 */
export async function evaluateChildren(
  dependencies: readonly Dependency[],
  cache: CacheInterface,
): Promise<void> {
  for (const dependency of dependencies) {
    if (!dependency.isEvaluated()) await dependency.evaluateDependency(cache)
  }
}

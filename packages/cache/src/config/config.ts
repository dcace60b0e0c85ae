import type { IConfig } from "./ports/config"

export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  private readonly data: Readonly<T>

  constructor(
    data: T,
    private readonly provenance: ReadonlyMap<string, string>,
    private readonly providedKeys: ReadonlySet<string>,
    private readonly sourceNames: readonly string[] = [],
  ) {
    this.data = Object.freeze(data)
  }

  get value(): Readonly<T> {
    return this.data
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance.get(key) ?? "default"
  }

  sourcesUsed(): string[] {
    const used = new Set(this.provenance.values())

    return [...new Set(this.sourceNames)].filter((name) => used.has(name))
  }

  unknownKeys(): string[] {
    const known = new Set(Object.keys(this.data))

    return [...this.providedKeys].filter((key) => !known.has(key))
  }
}

import type { ConfigSource } from "../ports/config-source"

/**
 * Values given in code, typically overrides applied last.
 */
export class ObjectSource implements ConfigSource {
  constructor(
    private readonly values: Record<string, unknown>,
    readonly name: string = "object:overrides",
  ) {}

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}

import type { ConfigSource } from "../ports/config-source"

export type EnvSourceOptions = {
  /**
   * Only variables starting with this prefix are read, with the prefix
   * stripped: `MYAPP_CACHE_MAX_ENTRIES` becomes `CACHE_MAX_ENTRIES`.
   */
  prefix?: string

  /** Defaults to `process.env`. */
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    const values: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(this.prefix)) {
        values[key.slice(this.prefix.length)] = value
      }
    }

    return values
  }
}

import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import { isNotFound } from "../../core/fs/is-not-found"
import type { ConfigSource } from "../ports/config-source"

export type DotenvSourceOptions = {
  /**
   * Absolute, or relative to `cwd`.
   *
   * @example ".env", ".env.production"
   */
  file: string

  /**
   * When `false`, a missing file loads as an empty source.
   */
  required: boolean

  /** @default process.cwd() */
  cwd?: string
}

/**
 * Reads a dotenv file without touching `process.env`.
 */
export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)

    try {
      const content = await fs.readFile(filePath, "utf-8")

      return parse(content)
    } catch (err) {
      if (!this.opts.required && isNotFound(err)) return {}

      throw err
    }
  }
}

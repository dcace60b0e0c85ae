import { createHash } from "node:crypto"
import fs from "node:fs/promises"
import { isNotFound } from "../fs/is-not-found"
import { SnapshotDependency } from "./snapshot-dependency"

export type FileDependencyOptions = {
  /**
   * What to compare:
   * - `"mtime"`: the file's modification time (cheap, the default)
   * - `"content"`: a SHA-256 digest of the file's contents
   */
  mode: "mtime" | "content"
}

/**
 * Depends on a file. A file that does not exist snapshots as `null`, so
 * creating or deleting it also counts as a change.
 */
export class FileDependency extends SnapshotDependency<number | string | null> {
  private readonly opts: FileDependencyOptions

  constructor(
    private readonly file: string,
    opts: Partial<FileDependencyOptions> = {},
  ) {
    super()
    this.opts = { mode: opts.mode ?? "mtime" }
  }

  protected async generateSnapshot(): Promise<number | string | null> {
    try {
      if (this.opts.mode === "content") {
        const content = await fs.readFile(this.file)

        return createHash("sha256").update(content).digest("hex")
      }

      const stats = await fs.stat(this.file)

      return stats.mtimeMs
    } catch (err) {
      if (isNotFound(err)) return null
      throw err
    }
  }
}

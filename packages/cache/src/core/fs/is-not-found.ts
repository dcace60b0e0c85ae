/**
 * Whether a file system call failed because the path does not exist.
 */
export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

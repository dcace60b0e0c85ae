import { createHash } from "node:crypto"
import type { CacheKey } from "../../ports/cache-key"
import { toCanonicalJson } from "./canonical-json"

const MAX_PLAIN_KEY_BYTES = 32
const PLAIN_KEY = /^[A-Za-z0-9]+$/

/**
 * Turn a raw cache key into a backend-safe string.
 *
 * Short alphanumeric keys (up to 32 bytes) pass through as they are, which
 * keeps them readable in the backend. Integers are converted to strings
 * first. Every other key collapses to the 32-character hex MD5 digest of its
 * string form, or of its canonical JSON for composite keys.
 *
 * Distinct keys may in principle share a digest; MD5 makes that unlikely
 * enough to accept.
 *
 * @throws {InvalidKeyError} when a composite key cannot be serialized.
 *
 * @example
 * ```ts
 * normalizeKey("user42")        // "user42"
 * normalizeKey(42)              // "42"
 * normalizeKey("user:42")       // md5("user:42")
 * normalizeKey({ b: 2, a: 1 })  // md5('{"a":1,"b":2}')
 * ```
 */
export function normalizeKey(key: CacheKey): string {
  if (isScalarKey(key)) {
    const str = String(key)

    return isPlainKey(str) ? str : digest(str)
  }

  return digest(toCanonicalJson(key))
}

/**
 * The text a key stands for when normalization is turned off: the string
 * form of scalar keys, canonical JSON for everything else.
 */
export function canonicalizeKey(key: CacheKey): string {
  return isScalarKey(key) ? String(key) : toCanonicalJson(key)
}

function isScalarKey(key: CacheKey): key is string | number | bigint {
  return (
    typeof key === "string" ||
    typeof key === "bigint" ||
    (typeof key === "number" && Number.isInteger(key))
  )
}

function isPlainKey(key: string): boolean {
  return PLAIN_KEY.test(key) && Buffer.byteLength(key, "utf8") <= MAX_PLAIN_KEY_BYTES
}

function digest(text: string): string {
  return createHash("md5").update(text).digest("hex")
}

export const KeyNormalizer = {
  normalize: normalizeKey,
  canonicalize: canonicalizeKey,
} as const

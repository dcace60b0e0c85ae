import { InvalidKeyError } from "../../errors/errors"

/**
 * Serialize a value to JSON text with object keys sorted at every depth, so
 * that structurally equal values always produce identical text.
 *
 * @remarks
 * Follows `JSON.stringify` for `toJSON` carriers and `undefined` members
 * (skipped in objects, `null` in arrays). As with JSON, `toJSON` is called at
 * most once per value, and a `toJSON` method found on its own result is left
 * out. Everything else JSON would silently drop or mangle is rejected.
 *
 * @throws {InvalidKeyError} on cycles, functions, symbols, bigints,
 * non-finite numbers and objects that are neither arrays nor plain records.
 */
export function toCanonicalJson(value: unknown): string {
  return write(value, "$", new Set())
}

function write(
  value: unknown,
  path: string,
  ancestors: Set<object>,
  fromToJson = false,
): string {
  if (value === null) return "null"

  switch (typeof value) {
    case "string":
    case "boolean":
      return JSON.stringify(value)
    case "number":
      if (!Number.isFinite(value)) {
        throw new InvalidKeyError(`non-finite number at ${path}`)
      }
      return JSON.stringify(value)
    case "object":
      return writeObject(value, path, ancestors, fromToJson)
    default:
      throw new InvalidKeyError(`${typeof value} at ${path} cannot be serialized`)
  }
}

function writeObject(
  value: object,
  path: string,
  ancestors: Set<object>,
  fromToJson: boolean,
): string {
  if (ancestors.has(value)) {
    throw new InvalidKeyError(`cyclic reference at ${path}`)
  }

  if (!fromToJson && "toJSON" in value && typeof value.toJSON === "function") {
    return write(value.toJSON(), path, ancestors, true)
  }

  ancestors.add(value)

  try {
    if (Array.isArray(value)) {
      const items = value.map((item: unknown, i) =>
        item === undefined ? "null" : write(item, `${path}[${i}]`, ancestors),
      )

      return `[${items.join(",")}]`
    }

    if (!isPlainRecord(value)) {
      throw new InvalidKeyError(
        `${value.constructor?.name ?? "object"} at ${path} cannot be serialized`,
      )
    }

    const entries: [string, unknown][] = Object.entries(value)
    const members = entries
      .filter(([k, v]) => v !== undefined && !(fromToJson && isToJsonMethod(k, v)))
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${write(v, `${path}.${k}`, ancestors)}`)

    return `{${members.join(",")}}`
  } finally {
    ancestors.delete(value)
  }
}

function isPlainRecord(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value)

  return proto === Object.prototype || proto === null
}

function isToJsonMethod(key: string, value: unknown): boolean {
  return key === "toJSON" && typeof value === "function"
}

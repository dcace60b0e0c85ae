import type { Dependency } from "./dependency"

export type PlainEntry<T> = {
  readonly kind: "plain"
  readonly value: T
}

export type TaggedEntry<T> = {
  readonly kind: "tagged"
  readonly value: T
  readonly dependency: Dependency
}

/**
 * What the facade actually writes to a backend.
 *
 * @remarks
 * Internal representation. Callers only ever see the unwrapped value.
 */
export type StoredEntry<T> = PlainEntry<T> | TaggedEntry<T>

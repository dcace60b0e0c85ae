import type { Milliseconds, Seconds } from "./time"

type SecondsSpan = { kind: "seconds"; seconds: Seconds }
type MillisecondsSpan = { kind: "milliseconds"; milliseconds: Milliseconds }

/**
 * A calendar interval, measured from the Unix epoch.
 *
 * @remarks
 * Months and years have no fixed length; they are resolved against
 * 1970-01-01T00:00:00Z, so `{ months: 1 }` is always 31 days.
 */
type IntervalSpan = {
  kind: "interval"
  years?: number
  months?: number
  days?: number
  hours?: number
  minutes?: number
  seconds?: number
}

/**
 * A relative time span. Never an absolute deadline.
 */
export type TtlSpan = SecondsSpan | MillisecondsSpan | IntervalSpan

/**
 * Time-to-live as accepted by the facade: a number of seconds or a span.
 *
 * @remarks
 * Zero or negative values are forwarded to the backend unchanged; backends
 * treat them as "do not store".
 */
export type Ttl = Seconds | TtlSpan

/**
 * Time-to-live as seen by a backend. `null` means the entry never expires.
 */
export type BackendTtl = Seconds | null

import type { BackendTtl, Ttl, TtlSpan } from "../../ports/cache-ttl"
import type { Seconds } from "../../ports/time"

/**
 * Resolve the TTL handed to a backend.
 *
 * An explicit TTL wins, then `defaultTtl`, then no expiry (`null`). Numbers
 * are forwarded as they are, zero and negatives included.
 */
export function normalizeTtl(ttl: Ttl | null | undefined, defaultTtl: BackendTtl): BackendTtl {
  if (ttl === undefined || ttl === null) return defaultTtl

  if (typeof ttl === "number") return ttl

  return spanToSeconds(ttl)
}

/**
 * Length of a span in whole seconds, measured by adding it to the Unix epoch.
 */
export function spanToSeconds(span: TtlSpan): Seconds {
  if (span.kind === "seconds") return span.seconds
  if (span.kind === "milliseconds") return Math.trunc(span.milliseconds / 1000)

  const at = new Date(0)

  at.setUTCFullYear(at.getUTCFullYear() + (span.years ?? 0))
  at.setUTCMonth(at.getUTCMonth() + (span.months ?? 0))
  at.setUTCDate(at.getUTCDate() + (span.days ?? 0))
  at.setUTCHours(at.getUTCHours() + (span.hours ?? 0))
  at.setUTCMinutes(at.getUTCMinutes() + (span.minutes ?? 0))
  at.setUTCSeconds(at.getUTCSeconds() + (span.seconds ?? 0))

  return Math.trunc(at.getTime() / 1000)
}

import type { Milliseconds } from "../../ports/time"

/**
 * Source of wall-clock time. Injected wherever expiry or versioning needs
 * "now", so tests can control it.
 */
export interface Clock {
  now(): Date
  nowMs(): Milliseconds
}

export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }

  nowMs(): Milliseconds {
    return Date.now()
  }
}

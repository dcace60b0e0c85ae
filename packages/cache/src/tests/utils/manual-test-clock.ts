import type { Clock } from "../../core/time/clock"
import type { Milliseconds } from "../../ports/time"

export class ManualTestClock implements Clock {
  constructor(private current: Date) {}

  nowMs(): Milliseconds {
    return this.current.getTime()
  }

  now(): Date {
    return this.current
  }

  advanceMs(ms: Milliseconds): void {
    this.current = new Date(this.current.getTime() + ms)
  }

  advanceSeconds(seconds: number): void {
    this.advanceMs(seconds * 1000)
  }
}

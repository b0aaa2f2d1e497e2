import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

/** Manually driven clock for tests. Time only moves through `advance()` and `set()`. */
export class FakeClock implements Clock {
  private time: Milliseconds

  constructor(start: Milliseconds | Date = 0) {
    this.time = start instanceof Date ? start.getTime() : start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  set(ms: Milliseconds | Date): void {
    this.time = ms instanceof Date ? ms.getTime() : ms
  }
}

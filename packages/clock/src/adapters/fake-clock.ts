import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

/** Only moves when told to. */
export class FakeClock implements Clock {
  private time: UnixMs

  constructor(start: Date | UnixMs = 0) {
    this.time = typeof start === "number" ? start : start.getTime()
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  set(at: Date | UnixMs): void {
    this.time = typeof at === "number" ? at : at.getTime()
  }
}

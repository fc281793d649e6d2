import type { UnixMs } from "./time"

export interface Clock {
  /**
   * Current time as a Date.
   *
   * @remarks
   * Prefer `nowMs()` for deadlines and arithmetic.
   */
  now(): Date

  nowMs(): UnixMs
}

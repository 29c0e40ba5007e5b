import type { Milliseconds } from "../../ports/time"

export type Clock = {
  /** Current time as a Date object. Prefer `nowMs()` for arithmetic. */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
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

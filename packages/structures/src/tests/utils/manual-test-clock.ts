import type { Clock } from "../../core/time/clock"
import type { Sleep } from "../../core/polling/sleep"
import type { Milliseconds } from "../../ports/time"

export class ManualTestClock implements Clock {
  public constructor(private nowDate: Date = new Date(0)) {}

  public nowMs(): Milliseconds {
    return this.nowDate.getTime()
  }

  public now(): Date {
    return this.nowDate
  }

  public advanceMs(ms: number): void {
    this.nowDate = new Date(this.nowDate.getTime() + ms)
  }
}

export function makeFakeSleep(clock: ManualTestClock): Sleep {
  return vi.fn(async (ms: number) => {
    clock.advanceMs(ms)
  })
}

import type { Milliseconds } from "../../ports/time"
import type { Clock } from "../time/clock"
import type { Sleep } from "./sleep"

export type PollUntilSuccess<T> = { ok: true; value: T }
export type PollUntilTimeoutFailure = { ok: false; reason: "timeout" }
export type PollUntilResult<T> = PollUntilSuccess<T> | PollUntilTimeoutFailure

export type PollOptions = {
  pollMs: Milliseconds

  /** Unset polls until `fn` yields a value. */
  timeoutMs?: Milliseconds
}

export type PollDeps = {
  clock: Clock
  sleep: Sleep
}

/**
 * Calls `fn` until it returns a non-null value or the deadline passes.
 *
 * @remarks
 * `fn` always runs at least once, so a zero timeout is a single attempt.
 */
export async function pollUntil<T>(
  fn: () => Promise<T | null>,
  deps: PollDeps,
  opts: PollOptions,
): Promise<PollUntilResult<T>> {
  if (opts.timeoutMs !== undefined && (!Number.isFinite(opts.timeoutMs) || opts.timeoutMs < 0)) {
    throw new Error(`Invalid timeoutMs: ${opts.timeoutMs}`)
  }

  if (!Number.isFinite(opts.pollMs) || opts.pollMs <= 0) {
    throw new Error(`Invalid pollMs: ${opts.pollMs}`)
  }

  const deadline =
    opts.timeoutMs === undefined ? undefined : deps.clock.nowMs() + opts.timeoutMs

  while (true) {
    const result = await fn()

    if (result !== null) return { ok: true, value: result }
    if (deadline !== undefined && deps.clock.nowMs() >= deadline) {
      return { ok: false, reason: "timeout" }
    }

    await deps.sleep(opts.pollMs)
  }
}

export type PollUntilFn = typeof pollUntil

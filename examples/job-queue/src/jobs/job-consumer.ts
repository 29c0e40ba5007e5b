import { setTimeout as sleep } from "node:timers/promises"
import type { Logger } from "@qredis/logger"
import {
  DecodingError,
  type GetResult,
  type Milliseconds,
  type Structure,
} from "@qredis/structures"
import type { Job, JobHandler } from "./job.model"

export type JobConsumerDeps = {
  queue: Structure<Job>
  handle: JobHandler
  logger: Logger
}

export type JobConsumerConfig = {
  /** How long one `get` waits before the loop re-checks `stop()`. */
  pollTimeoutMs: Milliseconds

  /** Pause after a failed `get` (e.g. Redis went away) before trying again. */
  errorBackoffMs: Milliseconds
}

export type ConsumeOutcome = "handled" | "failed" | "dropped" | "idle"

export class JobConsumer {
  private running = false
  private loop: Promise<void> | undefined

  constructor(
    private readonly deps: JobConsumerDeps,
    private readonly config: JobConsumerConfig,
  ) {}

  start(): void {
    if (this.running) return

    this.running = true
    this.loop = this.runLoop()
  }

  async stop(): Promise<void> {
    this.running = false

    await this.loop
    this.loop = undefined
  }

  /**
   * Takes at most one job and runs it. Handler failures are logged and the
   * job is not put back.
   */
  async consumeOne(): Promise<ConsumeOutcome> {
    let res: GetResult<Job>

    try {
      res = await this.deps.queue.get({ timeoutMs: this.config.pollTimeoutMs })
    } catch (err) {
      if (err instanceof DecodingError) {
        this.deps.logger.warn("skipped malformed job", { err })
        return "dropped"
      }
      throw err
    }

    if (res.kind === "empty") return "idle"

    const job = res.value
    const log = this.deps.logger.child({ jobId: job.id, task: job.task })

    try {
      await this.deps.handle(job)
      log.info("job handled")
      return "handled"
    } catch (err) {
      log.error("job failed", { err })
      return "failed"
    }
  }

  private async runLoop(): Promise<void> {
    while (this.running) {
      try {
        await this.consumeOne()
      } catch (err) {
        this.deps.logger.error("consume failed, backing off", {
          err,
          durationMs: this.config.errorBackoffMs,
        })
        await sleep(this.config.errorBackoffMs)
      }
    }
  }
}

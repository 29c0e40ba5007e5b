import type { Clock, Structure } from "@qredis/structures"
import { v7 as uuidv7 } from "uuid"
import type { Job } from "./job.model"

export type JobProducerDeps = {
  queue: Structure<Job>
  clock: Clock

  /** @default uuid v7 */
  newId?: () => string
}

export class JobProducer {
  private readonly newId: () => string

  constructor(private readonly deps: JobProducerDeps) {
    this.newId = deps.newId ?? uuidv7
  }

  async enqueue(task: string, payload: Record<string, string> = {}): Promise<Job> {
    const job: Job = {
      id: this.newId(),
      task,
      payload,
      enqueuedAt: this.deps.clock.nowMs(),
    }

    await this.deps.queue.put(job)

    return job
  }
}

import { z } from "zod"

export const jobSchema = z.object({
  id: z.string().min(1),
  task: z.string().min(1),
  payload: z.record(z.string(), z.string()),
  enqueuedAt: z.number().int().nonnegative(),
})

export type Job = z.infer<typeof jobSchema>

export type JobHandler = (job: Job) => Promise<void>

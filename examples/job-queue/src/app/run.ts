import { createPinoLogger, type Logger } from "@qredis/logger"
import {
  compressionEncoder,
  connectRedisStructures,
  loadStoreConfig,
  type LoadStoreConfigOptions,
  SystemClock,
  withEncoding,
} from "@qredis/structures"
import { JobConsumer } from "../jobs/job-consumer"
import { jobSchema } from "../jobs/job.model"
import { JobProducer } from "../jobs/job-producer"

export type RunningApp = {
  producer: JobProducer
  logger: Logger
  stop(): Promise<void>
}

export async function run(options: LoadStoreConfigOptions = {}): Promise<RunningApp> {
  const config = await loadStoreConfig(options)
  const logger = createPinoLogger({
    level: config.LOG_LEVEL,
    prettify: process.env.NODE_ENV !== "production",
  })

  const redis = await connectRedisStructures(config, { logger })
  const queue = withEncoding(
    await redis.factory.queue({ name: "jobs" }),
    compressionEncoder({ schema: jobSchema }),
    logger,
  )

  const consumer = new JobConsumer(
    {
      queue,
      logger,
      handle: async (job) => {
        logger.info("processing job", { op: job.task })
      },
    },
    { pollTimeoutMs: 1000, errorBackoffMs: 2000 },
  )

  consumer.start()
  logger.info("consumer started", { structure: queue.key })

  return {
    producer: new JobProducer({ queue, clock: new SystemClock() }),
    logger,
    stop: async () => {
      await consumer.stop()
      await redis.close()
    },
  }
}

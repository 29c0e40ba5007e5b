import type { Logger } from "@qredis/logger"
import type { ListStore } from "../../ports/list-store"
import { ConnectivityError } from "../errors/errors"
import { Queue, type QueueConfig } from "./queue"
import { Stack, type StackConfig } from "./stack"

export type CreateStructureOptions = {
  store: ListStore
  logger?: Logger
}

/**
 * Fails fast when the store cannot be reached.
 *
 * @throws ConnectivityError with the store's failure as `cause`. There is no
 * retry here; callers that want one retry the whole construction.
 */
export async function verifyLiveness(store: ListStore, logger?: Logger): Promise<void> {
  try {
    await store.ping()
  } catch (err) {
    logger?.error("list store liveness check failed", { err })
    throw new ConnectivityError("List store is unreachable", { cause: err })
  }
}

export async function createQueue(
  options: CreateStructureOptions & QueueConfig,
): Promise<Queue> {
  const { store, logger, ...config } = options

  await verifyLiveness(store, logger)

  return new Queue({ store, ...(logger && { logger }) }, config)
}

export async function createStack(
  options: CreateStructureOptions & StackConfig,
): Promise<Stack> {
  const { store, logger, ...config } = options

  await verifyLiveness(store, logger)

  return new Stack({ store, ...(logger && { logger }) }, config)
}

import type { Logger } from "@qredis/logger"
import { NullLogger } from "@qredis/logger"
import type { StoreConfig } from "../../core/config/store-config"
import { ConnectivityError } from "../../core/errors/errors"
import { StructureFactory } from "../../core/structures/structure-factory"
import type { NameGenerator } from "../../ports/name-generator"
import {
  createRedisListClient,
  type RedisListClient,
  type RedisListClientOptions,
} from "./redis-client"
import { RedisListStore } from "./redis-list-store"

/**
 * node-redis reconnect hook: a delay in ms, or an error (or `false`) to give up.
 */
export type ReconnectStrategy = (retries: number, cause: Error) => false | Error | number

/**
 * Gives up on the first failure until `isReady()` holds, so an unreachable
 * server rejects `connect()` instead of retrying forever. Afterwards dropped
 * connections are retried with a linear delay capped at `maxDelayMs`.
 */
export function failFastReconnect(
  isReady: () => boolean,
  maxDelayMs: number = 2000,
): ReconnectStrategy {
  return (retries, cause) => (isReady() ? Math.min((retries + 1) * 50, maxDelayMs) : cause)
}

/**
 * Maps loaded configuration to node-redis options. `REDIS_URL` wins over the
 * host/port pair; credentials and database are forwarded as given.
 *
 * @remarks
 * The offline queue is disabled so commands fail immediately while the
 * connection is down instead of waiting for a reconnect.
 */
export function toRedisClientOptions(
  config: StoreConfig,
  reconnectStrategy?: ReconnectStrategy,
): RedisListClientOptions {
  const address = config.REDIS_URL
    ? undefined
    : { host: config.REDIS_HOST, port: config.REDIS_PORT }
  const socket = reconnectStrategy ? { ...address, reconnectStrategy } : address

  return {
    ...(config.REDIS_URL ? { url: config.REDIS_URL } : {}),
    ...(socket && { socket }),
    database: config.REDIS_DB,
    ...(config.REDIS_USERNAME && { username: config.REDIS_USERNAME }),
    ...(config.REDIS_PASSWORD && { password: config.REDIS_PASSWORD }),
    disableOfflineQueue: true,
  }
}

export type RedisStructuresDeps = {
  logger?: Logger
  names?: NameGenerator

  /** Injection point for tests. */
  createClient?: (options: RedisListClientOptions) => RedisListClient
}

export type RedisStructures = {
  factory: StructureFactory
  store: RedisListStore
  close(): Promise<void>
}

/**
 * Opens a command connection and a dedicated blocking connection, and returns
 * a factory for structures on them.
 *
 * @remarks
 * Caller owns `close()`.
 *
 * @throws ConnectivityError when either connection cannot be established.
 */
export async function connectRedisStructures(
  config: StoreConfig,
  deps: RedisStructuresDeps = {},
): Promise<RedisStructures> {
  const logger = deps.logger ?? new NullLogger()
  const create = deps.createClient ?? createRedisListClient

  let ready = false
  const client = create(toRedisClientOptions(config, failFastReconnect(() => ready)))
  const blockingClient = client.duplicate()

  for (const c of [client, blockingClient]) {
    c.on("error", (err) => logger.error("redis client error", { err }))
  }

  try {
    await client.connect()
    await blockingClient.connect()
    ready = true
  } catch (err) {
    logger.error("failed to connect to redis", { err })
    await quitOpen([client, blockingClient], logger)

    throw new ConnectivityError("Could not connect to redis", {
      cause: err,
      context: {
        host: config.REDIS_URL ? undefined : config.REDIS_HOST,
        port: config.REDIS_URL ? undefined : config.REDIS_PORT,
        database: config.REDIS_DB,
      },
    })
  }

  const store = new RedisListStore(
    { client, blockingClient },
    { keyspacePrefix: config.KEYSPACE_PREFIX },
  )

  return {
    factory: new StructureFactory({
      store,
      logger,
      ...(deps.names && { names: deps.names }),
    }),
    store,
    close: async () => {
      if (client.isOpen) await client.quit()
      if (blockingClient.isOpen) await blockingClient.quit()
    },
  }
}

/**
 * Releases whatever connected before a failed setup. Quit failures are logged
 * so they do not replace the connect error.
 */
async function quitOpen(clients: RedisListClient[], logger: Logger): Promise<void> {
  for (const c of clients) {
    if (!c.isOpen) continue

    try {
      await c.quit()
    } catch (err) {
      logger.warn("failed to quit redis client after connect error", { err })
    }
  }
}

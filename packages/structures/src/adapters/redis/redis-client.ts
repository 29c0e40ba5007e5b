import { createClient, type RedisClientOptions } from "redis"

export type RedisPopResult = { key: string; element: string }

/**
 * The subset of the node-redis client this package calls.
 */
export type RedisListClient = {
  lLen(key: string): Promise<number>
  rPush(key: string, element: string): Promise<number>
  lPop(key: string): Promise<string | null>
  rPop(key: string): Promise<string | null>

  /** `timeout` is in seconds; 0 blocks forever. */
  blPop(key: string, timeout: number): Promise<RedisPopResult | null>
  brPop(key: string, timeout: number): Promise<RedisPopResult | null>

  ping(): Promise<string>

  connect(): Promise<unknown>
  quit(): Promise<unknown>
  duplicate(): RedisListClient
  on(event: "error", listener: (err: unknown) => void): unknown
  isOpen: boolean
}

export type RedisListClientOptions = RedisClientOptions

export function createRedisListClient(options: RedisListClientOptions): RedisListClient {
  return createClient(options) as unknown as RedisListClient
}

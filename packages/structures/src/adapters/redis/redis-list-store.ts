import type { ListKey, ListStore } from "../../ports/list-store"
import type { Milliseconds } from "../../ports/time"
import type { RedisListClient, RedisPopResult } from "./redis-client"

export type RedisListStoreDeps = {
  client: RedisListClient

  /**
   * Connection reserved for BLPOP/BRPOP. A blocked connection cannot serve
   * other commands, so sharing `client` stalls every structure on it until
   * the wait ends. Defaults to `client`.
   */
  blockingClient?: RedisListClient
}

export type RedisListStoreOptions = {
  /**
   * Prepended verbatim to every key, e.g. "app:prod:". Leave empty to read
   * and write keys exactly as `"<namespace>:<name>"`.
   */
  keyspacePrefix?: string
}

export class RedisListStore implements ListStore {
  private readonly client: RedisListClient
  private readonly blockingClient: RedisListClient
  private readonly prefix: string

  public constructor(deps: RedisListStoreDeps, opts: RedisListStoreOptions = {}) {
    this.client = deps.client
    this.blockingClient = deps.blockingClient ?? deps.client
    this.prefix = opts.keyspacePrefix ?? ""
  }

  async length(key: ListKey): Promise<number> {
    return await this.client.lLen(this.fullKey(key))
  }

  async pushRight(key: ListKey, value: string): Promise<number> {
    return await this.client.rPush(this.fullKey(key), value)
  }

  async popLeft(key: ListKey): Promise<string | null> {
    return await this.client.lPop(this.fullKey(key))
  }

  async popRight(key: ListKey): Promise<string | null> {
    return await this.client.rPop(this.fullKey(key))
  }

  async blockingPopLeft(key: ListKey, timeoutMs?: Milliseconds): Promise<string | null> {
    if (timeoutMs === 0) return await this.popLeft(key)

    const res = await this.blockingClient.blPop(this.fullKey(key), this.toSeconds(timeoutMs))

    return this.element(res)
  }

  async blockingPopRight(key: ListKey, timeoutMs?: Milliseconds): Promise<string | null> {
    if (timeoutMs === 0) return await this.popRight(key)

    const res = await this.blockingClient.brPop(this.fullKey(key), this.toSeconds(timeoutMs))

    return this.element(res)
  }

  async ping(): Promise<void> {
    await this.client.ping()
  }

  /** Redis takes fractional seconds; 0 means no timeout. */
  private toSeconds(timeoutMs?: Milliseconds): number {
    return timeoutMs === undefined ? 0 : timeoutMs / 1000
  }

  private element(res: RedisPopResult | null): string | null {
    return res === null ? null : res.element
  }

  private fullKey(k: ListKey): string {
    return `${this.prefix}${k}`
  }
}

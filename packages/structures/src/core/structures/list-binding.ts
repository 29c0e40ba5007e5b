import { type Logger, NullLogger } from "@qredis/logger"
import type { ListKey, ListStore } from "../../ports/list-store"
import type { GetOptions, GetResult, StructureKind } from "../../ports/structure"
import { assertValidTimeMs } from "../validation/validation"
import { formatStructureKey } from "./structure-key"

export type ListEnd = "left" | "right"

export type ListBindingDeps = {
  store: ListStore
  logger?: Logger
}

export type ListBindingConfig = {
  kind: StructureKind
  name: string

  /** Defaults to the kind ("queue" or "stack"). */
  namespace?: string
}

/**
 * Binds one list key to a store and implements everything Queue and Stack
 * share. Variants only choose the end `get` pops from.
 */
export class ListBinding {
  readonly key: ListKey
  readonly kind: StructureKind

  private readonly store: ListStore
  private readonly logger: Logger

  public constructor(deps: ListBindingDeps, config: ListBindingConfig) {
    this.kind = config.kind
    this.key = formatStructureKey(config.namespace ?? config.kind, config.name)
    this.store = deps.store
    this.logger = (deps.logger ?? new NullLogger()).child({
      structure: this.key,
      kind: this.kind,
    })
  }

  async size(): Promise<number> {
    return await this.store.length(this.key)
  }

  async empty(): Promise<boolean> {
    return (await this.size()) === 0
  }

  async push(item: string): Promise<void> {
    const length = await this.store.pushRight(this.key, item)

    this.logger.trace("pushed item", { op: "put", index: length - 1 })
  }

  async pop(end: ListEnd, opts: GetOptions = {}): Promise<GetResult<string>> {
    const block = opts.block ?? true

    if (opts.timeoutMs !== undefined) {
      assertValidTimeMs(opts.timeoutMs, "GetOptions.timeoutMs")
    }

    const value =
      block && opts.timeoutMs !== 0
        ? await this.blockingPop(end, opts.timeoutMs)
        : await this.immediatePop(end)

    if (value === null) {
      this.logger.trace("no item available", { op: "get" })
      return { kind: "empty" }
    }

    return { kind: "found", value }
  }

  private async blockingPop(end: ListEnd, timeoutMs?: number): Promise<string | null> {
    return end === "left"
      ? await this.store.blockingPopLeft(this.key, timeoutMs)
      : await this.store.blockingPopRight(this.key, timeoutMs)
  }

  private async immediatePop(end: ListEnd): Promise<string | null> {
    return end === "left"
      ? await this.store.popLeft(this.key)
      : await this.store.popRight(this.key)
  }
}

import type { GetOptions, GetResult, Structure } from "../../ports/structure"
import { ListBinding, type ListBindingDeps } from "./list-binding"

export type QueueConfig = {
  name: string

  /** @default "queue" */
  namespace?: string
}

/**
 * First-in, first-out: `put` appends right, `get` removes from the left.
 */
export class Queue implements Structure<string> {
  private readonly list: ListBinding

  public constructor(deps: ListBindingDeps, config: QueueConfig) {
    this.list = new ListBinding(deps, { ...config, kind: "queue" })
  }

  get key(): string {
    return this.list.key
  }

  get kind(): "queue" {
    return "queue"
  }

  async size(): Promise<number> {
    return await this.list.size()
  }

  async empty(): Promise<boolean> {
    return await this.list.empty()
  }

  async put(item: string): Promise<void> {
    await this.list.push(item)
  }

  async get(opts?: GetOptions): Promise<GetResult<string>> {
    return await this.list.pop("left", opts)
  }
}

import type { GetOptions, GetResult, Structure } from "../../ports/structure"
import { ListBinding, type ListBindingDeps } from "./list-binding"

export type StackConfig = {
  name: string

  /** @default "stack" */
  namespace?: string
}

/**
 * Last-in, first-out: `put` and `get` both work the right end.
 */
export class Stack implements Structure<string> {
  private readonly list: ListBinding

  public constructor(deps: ListBindingDeps, config: StackConfig) {
    this.list = new ListBinding(deps, { ...config, kind: "stack" })
  }

  get key(): string {
    return this.list.key
  }

  get kind(): "stack" {
    return "stack"
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
    return await this.list.pop("right", opts)
  }
}

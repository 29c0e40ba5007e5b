import { type Logger, NullLogger } from "@qredis/logger"
import type { GetOptions, GetResult, Structure, StructureKind } from "../../ports/structure"
import { ConfigurationError, RoutingIndexError } from "../errors/errors"
import { type Clock, SystemClock } from "../time/clock"
import { type HashFn, hashItem } from "./hash"

type MultiStructureCommon<T> = {
  /** @default hashItem */
  hash?: HashFn<T>

  /** Returns a float in [0, 1). Only used by unordered `get`. */
  random?: () => number

  /** Measures how much of a blocking `get` timeout the order structure used. */
  clock?: Clock

  logger?: Logger
}

export type UnorderedMultiStructureOptions<T> = MultiStructureCommon<T> & {
  preserve?: false

  /** At least two children. */
  structures: readonly Structure<T>[]
}

export type OrderedMultiStructureOptions<T> = MultiStructureCommon<T> & {
  preserve: true

  /**
   * The first entry records routing decisions; the rest (at least two) hold
   * the items. All of them must be of one kind.
   */
  structures: readonly [Structure<string>, ...Structure<T>[]]
}

export type MultiStructureOptions<T> =
  | UnorderedMultiStructureOptions<T>
  | OrderedMultiStructureOptions<T>

/**
 * Spreads items over several child structures.
 *
 * @remarks
 * `put` picks a child by `hash(item) mod n`.
 *
 * Unordered (`preserve` unset): `get` reads from a uniformly random child. It
 * does not reverse the hash, so no FIFO/LIFO order holds across the whole set,
 * but every item is eventually reachable and `size()` stays exact.
 *
 * Ordered (`preserve: true`): each `put` first records the chosen child index
 * on the order structure, then writes the item; `get` pops an index from the
 * order structure and reads from that child. The composite then follows the
 * FIFO/LIFO order of the children's kind. The two writes are not atomic; a
 * crash between them leaves an index with no item (or the reverse for `get`).
 */
export class MultiStructure<T> implements Structure<T> {
  readonly key: string
  readonly kind: StructureKind

  private readonly children: readonly Structure<T>[]
  private readonly order: Structure<string> | undefined
  private readonly hash: HashFn<T>
  private readonly random: () => number
  private readonly clock: Clock
  private readonly logger: Logger

  public constructor(opts: MultiStructureOptions<T>) {
    const { order, children } = MultiStructure.split(opts)

    const first = children[0]

    if (first === undefined || children.length < 2) {
      throw new ConfigurationError(
        opts.preserve
          ? "An ordered MultiStructure needs an order structure and at least two children"
          : "A MultiStructure needs at least two children",
        { context: { count: opts.structures.length, preserve: opts.preserve ?? false } },
      )
    }

    if (order && children.some((c) => c.kind !== first.kind)) {
      throw new ConfigurationError("Ordered MultiStructure children must share one kind", {
        context: { kinds: children.map((c) => c.kind) },
      })
    }

    // Recorded indexes must come back in the same direction the children pop.
    if (order && order.kind !== first.kind) {
      throw new ConfigurationError(
        `Ordered MultiStructure order structure must be a ${first.kind}, got a ${order.kind}`,
        { context: { order: order.kind, children: first.kind } },
      )
    }

    this.order = order
    this.children = children
    this.kind = first.kind
    this.key = `multi(${children.map((c) => c.key).join(",")})`
    this.hash = opts.hash ?? hashItem
    this.random = opts.random ?? Math.random
    this.clock = opts.clock ?? new SystemClock()
    this.logger = (opts.logger ?? new NullLogger()).child({
      structure: this.key,
      kind: this.kind,
    })
  }

  get preserving(): boolean {
    return this.order !== undefined
  }

  /**
   * Sum of the children's sizes; the order structure's entries are routing
   * metadata and are not counted.
   */
  async size(): Promise<number> {
    const sizes = await Promise.all(this.children.map((c) => c.size()))

    return sizes.reduce((total, n) => total + n, 0)
  }

  async empty(): Promise<boolean> {
    return (await this.size()) === 0
  }

  async put(item: T): Promise<void> {
    const index = this.route(item)

    if (this.order) {
      await this.order.put(String(index))
    }

    this.logger.debug("routing put", { op: "put", index })

    await this.child(index).put(item)
  }

  /**
   * In ordered mode `timeoutMs` bounds the whole call: the child read gets
   * whatever the order structure left of it.
   */
  async get(opts?: GetOptions): Promise<GetResult<T>> {
    if (!this.order) {
      const index = Math.floor(this.random() * this.children.length)

      this.logger.debug("routing get", { op: "get", index })

      return await this.child(index).get(opts)
    }

    const startedMs = this.clock.nowMs()
    const recorded = await this.order.get(opts)

    if (recorded.kind === "empty") return recorded

    const index = this.parseIndex(recorded.value)
    const durationMs = this.clock.nowMs() - startedMs

    this.logger.debug("routing get", { op: "get", index, durationMs })

    return await this.child(index).get(remainingOptions(opts, durationMs))
  }


  private route(item: T): number {
    const hashed = this.hash(item)

    if (!Number.isSafeInteger(hashed) || hashed < 0 || hashed > 0xffffffff) {
      throw new RoutingIndexError(`Hash must be an unsigned 32-bit integer, got ${hashed}`, {
        context: { hash: hashed },
      })
    }

    return hashed % this.children.length
  }

  private parseIndex(value: string): number {
    const index = /^\d+$/.test(value) ? Number(value) : Number.NaN

    if (!Number.isSafeInteger(index) || index >= this.children.length) {
      throw new RoutingIndexError(`Order structure holds invalid child index "${value}"`, {
        context: { value, children: this.children.length },
      })
    }

    return index
  }

  private child(index: number): Structure<T> {
    const child = this.children[index]

    if (child === undefined) {
      throw new RoutingIndexError(`No child at index ${index}`, {
        context: { index, children: this.children.length },
      })
    }

    return child
  }

  private static split<T>(opts: MultiStructureOptions<T>): {
    order: Structure<string> | undefined
    children: readonly Structure<T>[]
  } {
    if (opts.preserve) {
      const [order, ...children] = opts.structures

      return { order, children }
    }

    return { order: undefined, children: opts.structures }
  }
}

function remainingOptions(
  opts: GetOptions | undefined,
  elapsedMs: number,
): GetOptions | undefined {
  if (opts?.timeoutMs === undefined || opts.block === false) return opts

  return { ...opts, timeoutMs: Math.max(0, opts.timeoutMs - elapsedMs) }
}

export function createMultiStructure<T>(opts: MultiStructureOptions<T>): MultiStructure<T> {
  return new MultiStructure(opts)
}

import type { ListKey } from "./list-store"
import type { Milliseconds } from "./time"

export const structureKinds = ["queue", "stack"] as const

export type StructureKind = (typeof structureKinds)[number]

export type StructureFound<T> = {
  readonly kind: "found"
  readonly value: T
}

export type StructureEmpty = {
  readonly kind: "empty"
}

/**
 * Result of a `get`.
 *
 * @remarks
 * `empty` covers both a non-blocking miss and a blocking wait that timed out.
 * A timeout is an expected outcome, not an error.
 */
export type GetResult<T> = StructureFound<T> | StructureEmpty

export type GetOptions = {
  /**
   * Wait for an item when the structure is empty.
   *
   * @default true
   */
  block?: boolean

  /**
   * Maximum wait when blocking. Unset waits forever; `0` makes a single
   * non-blocking attempt.
   */
  timeoutMs?: Milliseconds
}

/**
 * Structure is a FIFO or LIFO collection bound to one list in the remote store.
 *
 * @remarks
 * - `put` always appends to the right end; variants differ only in which end
 *   `get` removes from.
 * - Instances hold no item state of their own. Any number of processes may
 *   share the same key.
 */
export interface Structure<T> {
  /** `"<namespace>:<name>"`. Fixed for the lifetime of the instance. */
  readonly key: ListKey

  readonly kind: StructureKind

  /**
   * Number of items currently stored.
   *
   * @remarks
   * Approximate under concurrent writers.
   */
  size(): Promise<number>

  /** `true` when `size()` is 0. */
  empty(): Promise<boolean>

  /**
   * Add an item. Never waits for space.
   */
  put(item: T): Promise<void>

  /**
   * Remove and return one item.
   */
  get(opts?: GetOptions): Promise<GetResult<T>>
}

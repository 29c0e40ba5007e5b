import type { Milliseconds } from "./time"

/**
 * Full key of a list in the remote store, e.g. "queue:jobs".
 */
export type ListKey = string

/**
 * ListStore is the remote list-backed key-value service every structure
 * lives on.
 *
 * @remarks
 * - Each call is atomic on the store side; nothing here spans two calls.
 * - Popping from an absent or empty list yields `null`, never an error.
 * - An empty list and a missing key are indistinguishable (`length` is 0).
 */
export interface ListStore {
  /**
   * Current length of the list at `key` (0 when absent).
   */
  length(key: ListKey): Promise<number>

  /**
   * Append `value` to the right end.
   *
   * @returns The list length after the push.
   */
  pushRight(key: ListKey, value: string): Promise<number>

  /** Remove and return the leftmost element, or `null` when empty. */
  popLeft(key: ListKey): Promise<string | null>

  /** Remove and return the rightmost element, or `null` when empty. */
  popRight(key: ListKey): Promise<string | null>

  /**
   * Wait for an element at the left end and remove it.
   *
   * @param timeoutMs Maximum wait. `undefined` waits forever.
   * @returns `null` once the timeout elapses with the list still empty.
   */
  blockingPopLeft(key: ListKey, timeoutMs?: Milliseconds): Promise<string | null>

  /**
   * Wait for an element at the right end and remove it.
   *
   * @param timeoutMs Maximum wait. `undefined` waits forever.
   */
  blockingPopRight(key: ListKey, timeoutMs?: Milliseconds): Promise<string | null>

  /**
   * Liveness check. Rejects when the store cannot be reached.
   */
  ping(): Promise<void>
}

import type { PollUntilFn } from "../../core/polling/poll-until"
import type { Sleep } from "../../core/polling/sleep"
import type { Clock } from "../../core/time/clock"
import type { ListKey, ListStore } from "../../ports/list-store"
import type { Milliseconds } from "../../ports/time"

export type MemoryListStoreDeps = {
  clock: Clock
  sleep: Sleep
  pollUntil: PollUntilFn
}

export type MemoryListStoreOptions = {
  /** Interval between attempts while a blocking pop waits. */
  pollMs: Milliseconds
}

/**
 * In-process ListStore. Lists live in a Map and vanish with the process.
 *
 * @remarks
 * Blocking pops poll rather than park on a wake-up signal, so a waiter sees a
 * push up to `pollMs` late. Single-threaded JS keeps every call atomic.
 */
export class MemoryListStore implements ListStore {
  private readonly lists = new Map<ListKey, string[]>()

  public constructor(
    private readonly deps: MemoryListStoreDeps,
    private readonly opts: MemoryListStoreOptions,
  ) {}

  async length(key: ListKey): Promise<number> {
    return this.lists.get(key)?.length ?? 0
  }

  async pushRight(key: ListKey, value: string): Promise<number> {
    const list = this.lists.get(key) ?? []
    list.push(value)
    this.lists.set(key, list)

    return list.length
  }

  async popLeft(key: ListKey): Promise<string | null> {
    return this.take(key, (list) => list.shift())
  }

  async popRight(key: ListKey): Promise<string | null> {
    return this.take(key, (list) => list.pop())
  }

  async blockingPopLeft(key: ListKey, timeoutMs?: Milliseconds): Promise<string | null> {
    return await this.waitFor(() => this.popLeft(key), timeoutMs)
  }

  async blockingPopRight(key: ListKey, timeoutMs?: Milliseconds): Promise<string | null> {
    return await this.waitFor(() => this.popRight(key), timeoutMs)
  }

  async ping(): Promise<void> {}

  /** Test helper: a copy of the list, left to right. */
  snapshot(key: ListKey): string[] {
    return [...(this.lists.get(key) ?? [])]
  }

  private take(key: ListKey, remove: (list: string[]) => string | undefined): string | null {
    const list = this.lists.get(key)
    if (!list) return null

    const value = remove(list)
    if (list.length === 0) this.lists.delete(key)

    return value ?? null
  }

  private async waitFor(
    attempt: () => Promise<string | null>,
    timeoutMs?: Milliseconds,
  ): Promise<string | null> {
    const res = await this.deps.pollUntil(
      attempt,
      { clock: this.deps.clock, sleep: this.deps.sleep },
      {
        pollMs: this.opts.pollMs,
        ...(timeoutMs !== undefined && { timeoutMs }),
      },
    )

    return res.ok ? res.value : null
  }
}

import type { Logger } from "@qredis/logger"
import { pollUntil } from "../../core/polling/poll-until"
import { sleep } from "../../core/polling/sleep"
import { StructureFactory } from "../../core/structures/structure-factory"
import { type Clock, SystemClock } from "../../core/time/clock"
import type { NameGenerator } from "../../ports/name-generator"
import { MemoryListStore, type MemoryListStoreOptions } from "./memory-list-store"

export type MemoryListStoreBundleOptions = Partial<MemoryListStoreOptions> & {
  clock?: Clock
}

export function createMemoryListStore(
  options: MemoryListStoreBundleOptions = {},
): MemoryListStore {
  return new MemoryListStore(
    { clock: options.clock ?? new SystemClock(), sleep, pollUntil },
    { pollMs: options.pollMs ?? 10 },
  )
}

export function createMemoryStructures(
  options: MemoryListStoreBundleOptions & { logger?: Logger; names?: NameGenerator } = {},
): { factory: StructureFactory; store: MemoryListStore } {
  const { logger, names, ...storeOptions } = options
  const store = createMemoryListStore(storeOptions)

  return {
    factory: new StructureFactory({
      store,
      ...(logger && { logger }),
      ...(names && { names }),
    }),
    store,
  }
}

import type { NameGenerator } from "../../ports/name-generator"
import type { StructureKind } from "../../ports/structure"

/**
 * Hands out "0", "1", "2", ... independently per kind.
 *
 * @remarks
 * Counters live on the instance. Two generators produce overlapping names, so
 * share one instance (usually through a `StructureFactory`) per keyspace.
 */
export class SequentialNameGenerator implements NameGenerator {
  private readonly counters = new Map<StructureKind, number>()

  next(kind: StructureKind): string {
    const current = this.counters.get(kind) ?? 0
    this.counters.set(kind, current + 1)

    return String(current)
  }
}

import type { StructureKind } from "./structure"

/**
 * Supplies default structure names when a caller does not pass one.
 */
export interface NameGenerator {
  next(kind: StructureKind): string
}

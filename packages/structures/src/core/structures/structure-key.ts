import type { ListKey } from "../../ports/list-store"
import { type StructureKind, structureKinds } from "../../ports/structure"
import { ConfigurationError } from "../errors/errors"

/**
 * Builds the list key `"<namespace>:<name>"`.
 *
 * @remarks
 * This layout is what existing data in the store is keyed by; the separator
 * and ordering must not change.
 */
export function formatStructureKey(namespace: string, name: string): ListKey {
  if (namespace.length === 0) {
    throw new ConfigurationError("Structure namespace must not be empty", {
      context: { name },
    })
  }

  if (name.length === 0) {
    throw new ConfigurationError("Structure name must not be empty", {
      context: { namespace },
    })
  }

  return `${namespace}:${name}`
}

export function isStructureKind(value: unknown): value is StructureKind {
  return structureKinds.some((kind) => kind === value)
}

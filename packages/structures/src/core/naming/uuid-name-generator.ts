import { v7 } from "uuid"
import type { NameGenerator } from "../../ports/name-generator"

/**
 * Time-ordered UUIDs; unique across processes without coordination.
 */
export const uuidNameGenerator: NameGenerator = { next: () => v7() }

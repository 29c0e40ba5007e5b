import type { AppError } from "../ports/error"

const fieldChecks: Record<string, (v: unknown) => boolean> = {
  name: (v) => typeof v === "string",
  message: (v) => typeof v === "string",
  code: (v) => typeof v === "string",
  context: (v) => typeof v === "object" && v !== null,
  isRetryable: (v) => typeof v === "boolean",
  isOperational: (v) => typeof v === "boolean",
  timestamp: (v) => v instanceof Date && !Number.isNaN(v.getTime()),
}

/**
 * Structural check, so errors from another copy of this package still match.
 */
export function isAppError(e: unknown): e is AppError {
  if (typeof e !== "object" || e === null) return false

  return Object.entries(fieldChecks).every(([field, check]) =>
    check(Reflect.get(e, field)),
  )
}

import type { SerializedError } from "../ports/error"
import { isAppError } from "./is-app-error"

/**
 * Flattens any thrown value, following `cause` links. A cause that points
 * back into the chain ends it.
 */
export function serializeError(err: unknown): SerializedError {
  return serializeLink(err, new Set())
}

function serializeLink(err: unknown, seen: Set<unknown>): SerializedError {
  seen.add(err)

  const cause =
    err instanceof Error && err.cause !== undefined && !seen.has(err.cause)
      ? { cause: serializeLink(err.cause, seen) }
      : {}

  if (isAppError(err)) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...cause,
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      ...cause,
    }
  }

  return {
    name: "ThrownValue",
    code: "unknown",
    message: typeof err === "string" ? err : `Thrown ${typeof err}`,
    context: { value: err },
    isOperational: false,
  }
}

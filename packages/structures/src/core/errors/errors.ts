import { type AppError, BaseError, type ErrorContext, isAppError } from "@qredis/errors"

export type StructureErrorCode =
  | "connectivity_error"
  | "configuration_error"
  | "encoding_error"
  | "decoding_error"
  | "parse_error"
  | "routing_index_error"

type StructureErrorOptions = {
  context?: ErrorContext
  cause?: unknown
}

/**
 * The store could not be reached, or failed its liveness check.
 */
export class ConnectivityError extends BaseError<"connectivity_error"> {
  constructor(message: string, options: StructureErrorOptions = {}) {
    super(message, { code: "connectivity_error", isRetryable: true, ...options })
  }
}

/**
 * Construction arguments or loaded configuration are invalid.
 */
export class ConfigurationError extends BaseError<"configuration_error"> {
  constructor(message: string, options: StructureErrorOptions = {}) {
    super(message, { code: "configuration_error", ...options })
  }
}

/**
 * An encoder rejected an item on `put`. The item never reached the store.
 */
export class EncodingError extends BaseError<"encoding_error"> {
  constructor(item: unknown, options: { encoder: string; key: string; cause: unknown }) {
    super(`Encoder "${options.encoder}" failed to encode item for ${options.key}`, {
      code: "encoding_error",
      context: { item, encoder: options.encoder, key: options.key },
      cause: options.cause,
    })
  }
}

/**
 * An encoder rejected a stored value on `get`.
 *
 * @remarks
 * The value has already been removed from the store when this is thrown;
 * `context.raw` is the only remaining copy.
 */
export class DecodingError extends BaseError<"decoding_error"> {
  constructor(raw: string, options: { encoder: string; key: string; cause: unknown }) {
    super(`Encoder "${options.encoder}" failed to decode value from ${options.key}`, {
      code: "decoding_error",
      context: { raw, encoder: options.encoder, key: options.key },
      cause: options.cause,
    })
  }
}

/**
 * A value handed to an encoder does not fit its format or schema, on either
 * `encode` or `decode`.
 */
export class ParseError extends BaseError<"parse_error"> {
  constructor(message: string, options: StructureErrorOptions = {}) {
    super(message, { code: "parse_error", ...options })
  }
}

/**
 * A MultiStructure computed or read a child index that does not exist.
 */
export class RoutingIndexError extends BaseError<"routing_index_error"> {
  constructor(message: string, options: StructureErrorOptions = {}) {
    super(message, { code: "routing_index_error", isOperational: false, ...options })
  }
}

const structureErrorCodes: ReadonlySet<string> = new Set<StructureErrorCode>([
  "connectivity_error",
  "configuration_error",
  "encoding_error",
  "decoding_error",
  "parse_error",
  "routing_index_error",
])

/**
 * Matches errors raised by this package, including ones that crossed a
 * module boundary and are no longer `instanceof` the local classes.
 */
export function isStructureError(
  err: unknown,
): err is AppError & { readonly code: StructureErrorCode } {
  return isAppError(err) && structureErrorCodes.has(err.code)
}

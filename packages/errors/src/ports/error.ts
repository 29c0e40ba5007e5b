export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error: keys, raw payloads, indexes.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** `true` when the same call may succeed later, e.g. a dropped connection. */
  readonly isRetryable: boolean

  /**
   * `false` marks a broken invariant rather than a failure the caller can
   * expect and handle.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/**
 * JSON-safe form of an error and its cause chain, for log lines.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  isOperational: boolean

  /** ISO string; only errors that record when they happened carry one. */
  timestamp?: string
  cause?: SerializedError
}>

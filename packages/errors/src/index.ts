export { BaseError, type BaseErrorOptions } from "./core/base-error"
export { isAppError } from "./core/is-app-error"
export { serializeError } from "./core/serialize-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"

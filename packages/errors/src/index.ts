export {
  BaseError,
  type BaseErrorOptions,
  MIN_REDACT_LENGTH,
  serializeError,
} from "./core/base-error"
export type { SerializeOptions } from "./core/base-error"
export { isAppError } from "./core/utils/is-app-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"

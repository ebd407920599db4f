export {
  BaseError,
  type BaseErrorOptions,
  type SerializeOptions,
  serializeError,
} from "./core/base-error"
export { isAppError, isRetryableError } from "./core/is-app-error"
export {
  isNotFoundError,
  isObjectStoreError,
  ObjectStoreError,
  ObjectStoreErrorCode,
  type ObjectStoreErrorContext,
  type ObjectStoreErrorOptions,
} from "./core/object-store-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"

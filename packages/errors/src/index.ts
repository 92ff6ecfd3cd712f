export { BaseError, type BaseErrorOptions, type SerializeOptions, serializeError } from "./core/base-error"
export { errorChain, rootCause } from "./core/utils/error-chain"
export { isAppError } from "./core/utils/is-app-error"
export { type ToAppErrorOptions, toAppError } from "./core/utils/to-app-error"
export type {
  AppError,
  ErrorCode,
  ErrorContext,
  ErrorScope,
  SerializedError,
} from "./ports/error"

import type { AppError, ErrorCode, ErrorScope } from "../../ports/error"
import { BaseError } from "../base-error"
import { isAppError } from "./is-app-error"

export type ToAppErrorOptions = {
  /** Code for values that are not already an AppError. Default: "unknown" */
  fallbackCode?: ErrorCode
  /** Scope for values that are not already an AppError. Default: "record" */
  fallbackScope?: ErrorScope
}

/**
 * Convert any thrown value to an AppError.
 *
 * - AppErrors pass through unchanged
 * - Error instances are wrapped with isOperational: false (assume unexpected)
 * - Non-Error values are wrapped with isOperational: false (likely a bug)
 */
export function toAppError(err: unknown, options: ToAppErrorOptions = {}): AppError {
  if (isAppError(err)) {
    return err
  }

  const code = options.fallbackCode ?? "unknown"
  const scope = options.fallbackScope ?? "record"

  if (err instanceof Error) {
    return new BaseError(err.message, { code, scope, cause: err, isOperational: false })
  }

  return new BaseError(typeof err === "string" ? err : "Unknown error", {
    code,
    scope,
    context: typeof err === "string" ? {} : { value: err },
    isOperational: false,
  })
}

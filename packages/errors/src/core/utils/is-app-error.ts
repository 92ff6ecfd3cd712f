import type { AppError, ErrorScope } from "../../ports/error"

const SCOPES: ReadonlySet<unknown> = new Set<ErrorScope>(["definition", "record", "codec"])

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Type guard to check if a value is an AppError.
 *
 * @example
 * ```ts
 * if (isAppError(err) && err.scope === "definition") {
 *   // the table definition needs fixing
 * }
 * ```
 */
export function isAppError(e: unknown): e is AppError {
  if (!isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    SCOPES.has(e.scope) &&
    isRecord(e.context) &&
    typeof e.isOperational === "boolean" &&
    isValidDate(e.timestamp) &&
    typeof e.message === "string" &&
    typeof e.name === "string"
  )
}

export type ErrorCode = Lowercase<string>

/**
 * The layer that raised a failure.
 *
 * - `definition`: a table definition is malformed. Raised once, on first use of
 *   the definition, and never fixed by retrying with other data.
 * - `record`: one record (or one stored row) could not be mapped. Other records
 *   in the same batch are unaffected.
 * - `codec`: a value could not be converted to or from bytes.
 */
export type ErrorScope = "definition" | "record" | "codec"

/**
 * Contextual metadata attached to errors.
 * Use this to carry structured data (record type, field, family...) without string munging.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  readonly scope: ErrorScope

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /**
   * Indicates whether this is an expected runtime failure (true) or a programmer
   * error / invariant violation (false).
   *
   * @remarks
   * Definition errors are never operational: the declaration must be fixed.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * Serialized error shape for logging and transport.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  scope?: ErrorScope
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>

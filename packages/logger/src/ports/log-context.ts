export type LogContext = {
  service: string
  env: string
  module: string

  /** Mapper operation being performed, e.g. "write", "read", "resolve" */
  operation: string
  /** Name of the record class */
  recordType: string
  /** Table name from the definition */
  table: string

  field: string
  family: string
  qualifier: string

  /** Position of a record inside a batch call */
  index: number
  fieldCount: number
}

export type LogEvent = {
  err: unknown
  /** Message of the innermost cause of err */
  rootCause: string
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>

export type LogContext = {
  service: string
  module: string
  env: string
  operation: string
}

export type LogEvent = {
  /** Error being logged. `Error` values are rendered with their full cause chain. */
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>

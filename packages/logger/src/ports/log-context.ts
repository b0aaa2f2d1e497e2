/**
 * Fields a database client attaches to its log lines.
 */
export type LogContext = {
  service: string
  env: string

  /** Remote collection the client is bound to. */
  collection: string
  /** Public client operation, e.g. `get`, `putMany`. */
  operation: string
  key: string

  method: string
  path: string
  status: number
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>

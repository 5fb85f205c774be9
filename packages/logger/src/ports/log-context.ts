/**
 * Fields bound to a logger through `child()`.
 */
export type LogContext = {
  service: string
  module: string

  /** Logical database name, e.g. `CONFIG_DB`. */
  dbName: string
  /** Numeric database index on the store. */
  dbId: number

  table: string
  operation: string
}

/** Per-call fields. */
export type LogEvent = {
  err: unknown
  key: string
  pattern: string
  channel: string
  attempt: number
  delayMs: number
  waitedMs: number
  count: number
}

export type LogContextPatch = Partial<LogContext>

export type LogMeta<TContext extends LogContextPatch = LogContext> = Partial<TContext> &
  Partial<LogEvent>

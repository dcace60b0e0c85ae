/**
 * Fields a cache deployment binds to its loggers.
 *
 * @remarks
 * `keyPrefix` identifies the cache owner when several facades share one
 * backend; `operation` and `key` scope a single call.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  keyPrefix: string
  operation: string
  key: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay merged into an existing context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>

/**
 * Well-known fields bound to a logger or passed per call.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  itemCode: string
  batchId: string
  batchSize: number

  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>

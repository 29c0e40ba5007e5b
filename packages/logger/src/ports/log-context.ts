export type LogContext = {
  /** Full list key of the structure, e.g. "queue:jobs". */
  structure: string
  kind: string

  op: string
  index: number
  durationMs: number

  service: string
  module: string
  env: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>

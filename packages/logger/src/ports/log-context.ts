/**
 * Fields a cluster cache attaches to its log lines.
 *
 * @remarks
 * `endpoint` and `node` are `host:port` strings. `generation` is the
 * membership generation the line refers to.
 */
export type LogContext = {
  service: string
  module: string

  endpoint: string
  node: string
  operation: string
  generation: number

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

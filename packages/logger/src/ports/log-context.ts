export type LogContext = {
  service: string
  module: string

  /** JSON-RPC method being invoked, e.g. `generateIntegers` */
  rpcMethod: string
  /** JSON-RPC request id */
  rpcId: string | number

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

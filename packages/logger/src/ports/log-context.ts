/**
 * Well-known structured fields. Adapters emit them verbatim.
 */
export type LogContext = {
  requestId: string
  method: string
  path: string
  route: string
  status: number
  durationMs: number

  service: string
  module: string
  env: string

  operation: string
  bucket: string
  key: string
  prefix: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

export type LogBindings = Partial<LogContext> & Record<string, unknown>

export type LogContext = {
  service: string
  module: string

  /** Record key the log line is about, e.g. "ip6" */
  key: string
  /** Entry kind tag, e.g. "ipv6-addr" */
  kind: string
  /** Encoded size in bytes */
  size: number

  /** Config source that supplied a setting, e.g. "env" or "default" */
  source: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>

export type LogContext = {
  module: string

  /** Origin description of the source being parsed or configured. */
  origin: string
  syntax: string
  includer: string

  /** Settings source name, e.g. "env" or "object". */
  source: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Overlay applied by child() on top of the parent context.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>

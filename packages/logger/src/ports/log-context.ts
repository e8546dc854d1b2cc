export type LogContext = {
  service: string
  env: string

  /** Subsystem emitting the entry, e.g. "registry" or "infisical". */
  component: string
  /** Name of the provider involved, when there is one. */
  provider: string
}

export type LogOutcome = {
  status: number
  durationMs: number
  count: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogOutcome> &
  Partial<LogEvent> &
  Record<string, unknown>

/** Overlay applied by child() on top of the parent context. */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>

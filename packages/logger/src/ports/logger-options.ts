import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output for local development.
   * Leave off in production where JSON lines are ingested.
   */
  prettify?: boolean
}

export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors (paths, status codes, keys).
 * Never put secret values here: context ends up in logs.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if retrying might succeed */
  readonly isRetryable: boolean

  /**
   * Expected runtime failure (`true`: missing file, rejected credentials,
   * upstream outage) versus a programmer error (`false`).
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/** JSON.stringify-safe error shape for logs. */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>

import { BaseError } from "@envstack/errors"

export type ProviderErrorCode =
  | "file_not_found"
  | "invalid_response"
  | "authentication_failed"
  | "fetch_failed"

type HttpFailure = { status: number; body: string }

/** Upstream overload or outage; the same request may succeed later. */
function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500
}

/** Raised by providers; propagates unchanged through registry lookups. */
export class ProviderError extends BaseError<ProviderErrorCode> {
  static fileNotFound(path: string, cause?: unknown): ProviderError {
    return new ProviderError(`Environment file not found: ${path}`, {
      code: "file_not_found",
      context: { path },
      cause,
    })
  }

  static invalidResponse(input: { url: string; issues?: string }, cause?: unknown): ProviderError {
    return new ProviderError("Invalid response from Infisical API", {
      code: "invalid_response",
      context: input,
      cause,
      isRetryable: true,
    })
  }

  static authenticationFailed(input: HttpFailure): ProviderError {
    return new ProviderError(`Infisical authentication failed (${input.status}): ${input.body}`, {
      code: "authentication_failed",
      context: input,
      isRetryable: isTransientStatus(input.status),
    })
  }

  static fetchFailed(input: HttpFailure): ProviderError {
    return new ProviderError(
      `Failed to fetch secrets from Infisical (${input.status}): ${input.body}`,
      {
        code: "fetch_failed",
        context: input,
        isRetryable: isTransientStatus(input.status),
      },
    )
  }
}

export class EnvError extends BaseError<"missing_env"> {
  static missing(key: string): EnvError {
    return new EnvError(`Missing required environment variable: ${key}`, {
      code: "missing_env",
      context: { key },
    })
  }
}

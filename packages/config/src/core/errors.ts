import { BaseError } from "@envstack/errors"

export type ConfigErrorCode = "config_invalid" | "config_source_missing"

export class ConfigError extends BaseError<ConfigErrorCode> {
  static invalid(input: { issues: string; sources: string[] }): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${input.issues}`, {
      code: "config_invalid",
      context: input,
    })
  }

  static sourceMissing(input: { source: string; path: string }): ConfigError {
    return new ConfigError(`Required configuration file not found: ${input.path}`, {
      code: "config_source_missing",
      context: input,
    })
  }
}

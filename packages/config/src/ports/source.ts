/**
 * A source of raw configuration values.
 *
 * Sources only load; validation, coercion and merging happen in `loadConfig`.
 * Sources are applied in order and later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Used for provenance in `Config.explain()`.
   * Example: "env", "env:INFISICAL_", "dotenv:.env.local"
   */
  readonly name: string

  /** A key mapped to `undefined` counts as not provided. */
  load(): Promise<Record<string, string | undefined>>
}

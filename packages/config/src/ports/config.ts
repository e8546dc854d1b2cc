/**
 * Validated configuration with provenance.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({
 *     INFISICAL_URL: z.url(),
 *     INFISICAL_CACHE_TTL_SECONDS: z.coerce.number().default(300),
 *   }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("INFISICAL_CACHE_TTL_SECONDS") // 300
 * config.explain("INFISICAL_URL")           // "env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /** Name of the source that supplied `key`, or "default" when the schema did. */
  explain<K extends keyof T & string>(key: K): string

  /** Distinct provenance names across the configured keys. */
  sourcesUsed(): string[]

  /** Keys some source provided that the schema does not know. */
  extras(): string[]
}

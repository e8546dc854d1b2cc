/**
 * A runtime source of environment values: a remote secret store, a `.env`
 * file read at run time, an in-memory map.
 *
 * Providers are queried by a `ProviderRegistry` in registration order; the
 * first provider that knows a key wins.
 *
 * Implementations must tolerate concurrent calls: the registry never
 * serializes access to a provider.
 */
export interface EnvProvider {
  /** Shows up in logs and in `EnvResolver.explain()`. */
  readonly name: string

  /** `null` when this provider does not know `key`. */
  get(key: string): Promise<string | null>

  /** Every key this provider knows. The caller owns the returned object. */
  getAll(): Promise<Record<string, string>>
}

/** Any class (abstract or not) whose instances are providers. */
export type ProviderClass<P extends EnvProvider> = abstract new (...args: never[]) => P

import { isAppError } from "@envstack/errors"
import { createNullLogger, type Logger } from "@envstack/logger"
import type { EnvProvider, ProviderClass } from "../ports/provider"
import { assignOwn } from "./own-value"

/**
 * Returned by `ProviderRegistry.addProvider`; hands the registered instance
 * back with its concrete type.
 */
export class ProviderHandle<P extends EnvProvider> {
  constructor(readonly provider: P) {}
}

export type ProviderHit = {
  value: string
  provider: EnvProvider
}

export type ProviderRegistryDeps = {
  logger?: Logger
}

/**
 * Ordered set of runtime providers. Registration order is priority order:
 * the first provider added is asked first and wins merges.
 *
 * Mutations replace the list instead of editing it, so every query walks the
 * list as it stood when the query began. Providers added or removed while a
 * query is suspended do not affect that query.
 *
 * Lookups fail fast: the first provider that rejects ends the lookup with its
 * error and later providers are not consulted.
 */
export class ProviderRegistry {
  private entries: readonly ProviderHandle<EnvProvider>[] = []
  private readonly logger: Logger

  constructor(deps: ProviderRegistryDeps = {}) {
    this.logger = (deps.logger ?? createNullLogger()).child({ component: "registry" })
  }

  /** Appends `provider` at the lowest priority. */
  addProvider<P extends EnvProvider>(provider: P): ProviderHandle<P> {
    const handle = new ProviderHandle(provider)

    this.entries = [...this.entries, handle]
    this.logger.debug("provider registered", {
      provider: provider.name,
      count: this.entries.length,
    })

    return handle
  }

  removeAllProviders(): void {
    const count = this.entries.length

    this.entries = []
    this.logger.debug("providers cleared", { count })
  }

  /** The handle's provider while it is still registered, else `null`. */
  getProvider<P extends EnvProvider>(handle: ProviderHandle<P>): P | null {
    return this.entries.includes(handle) ? handle.provider : null
  }

  /** First registered provider that is an instance of `type`. */
  getProviderByType<P extends EnvProvider>(type: ProviderClass<P>): P | null {
    for (const { provider } of this.entries) {
      if (provider instanceof type) return provider
    }

    return null
  }

  get hasProviders(): boolean {
    return this.entries.length > 0
  }

  get size(): number {
    return this.entries.length
  }

  /** Value and provider from the highest-priority provider that knows `key`. */
  async findInProviders(key: string): Promise<ProviderHit | null> {
    const snapshot = this.entries

    for (const { provider } of snapshot) {
      const value = await this.ask(provider, "get", () => provider.get(key))

      if (value !== null) {
        this.logger.debug("key resolved", { provider: provider.name, key })

        return { value, provider }
      }
    }

    return null
  }

  async getFromProviders(key: string): Promise<string | null> {
    const hit = await this.findInProviders(key)

    return hit?.value ?? null
  }

  /** Union of every provider's values; on conflict the higher priority wins. */
  async getAllFromProviders(): Promise<Record<string, string>> {
    const snapshot = this.entries
    const merged: Record<string, string> = {}

    for (const { provider } of [...snapshot].reverse()) {
      assignOwn(merged, await this.ask(provider, "getAll", () => provider.getAll()))
    }

    return merged
  }

  private async ask<T>(
    provider: EnvProvider,
    operation: "get" | "getAll",
    call: () => Promise<T>,
  ): Promise<T> {
    try {
      return await call()
    } catch (err) {
      this.logger.warn("provider failed", {
        provider: provider.name,
        operation,
        err,
        ...(isAppError(err) && { code: err.code }),
      })
      throw err
    }
  }
}

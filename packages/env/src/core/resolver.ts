import { createNullLogger, type Logger } from "@envstack/logger"
import { EnvError } from "./errors"
import { assignOwn, ownValue } from "./own-value"
import type { ProviderRegistry } from "./registry"

export type ResolutionLayer = `provider:${string}` | "compiled" | "env"

export type EnvResolverDeps = {
  registry: ProviderRegistry
  logger?: Logger
}

export type EnvResolverOptions = {
  /** Values embedded at build time. */
  compiled?: Readonly<Record<string, string>>
  /** @default process.env */
  env?: Readonly<Record<string, string | undefined>>
}

/**
 * Application-facing lookup over three layers, highest priority first:
 * runtime providers, compiled values, the process environment.
 */
export class EnvResolver {
  private readonly compiled: Readonly<Record<string, string>>
  private readonly env: Readonly<Record<string, string | undefined>>
  private readonly logger: Logger

  constructor(
    private readonly deps: EnvResolverDeps,
    options: EnvResolverOptions = {},
  ) {
    this.compiled = options.compiled ?? {}
    this.env = options.env ?? process.env
    this.logger = (deps.logger ?? createNullLogger()).child({ component: "resolver" })
  }

  async get(key: string): Promise<string | null> {
    const hit = await this.deps.registry.findInProviders(key)

    return hit ? hit.value : this.getSync(key)
  }

  /** Compiled values and the process environment only; never touches providers. */
  getSync(key: string): string | null {
    return ownValue(this.compiled, key) ?? ownValue(this.env, key)
  }

  async require(key: string): Promise<string> {
    const value = await this.get(key)

    if (value === null) {
      this.logger.error("required variable missing", { key })
      throw EnvError.missing(key)
    }

    return value
  }

  async getAll(): Promise<Record<string, string>> {
    const providers = await this.deps.registry.getAllFromProviders()
    const merged = assignOwn({}, this.env)

    assignOwn(merged, this.compiled)

    return assignOwn(merged, providers)
  }

  /** The layer that currently supplies `key`, or `null` when none does. */
  async explain(key: string): Promise<ResolutionLayer | null> {
    const hit = await this.deps.registry.findInProviders(key)

    if (hit) return `provider:${hit.provider.name}`
    if (ownValue(this.compiled, key) !== null) return "compiled"
    if (ownValue(this.env, key) !== null) return "env"

    return null
  }
}

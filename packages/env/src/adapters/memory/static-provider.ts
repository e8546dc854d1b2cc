import { ownValue } from "../../core/own-value"
import type { EnvProvider } from "../../ports/provider"

export type StaticProviderOptions = {
  /** @default "static" */
  name?: string
}

/**
 * Fixed in-memory values. Useful for tests, local overrides, and for exposing
 * compiled values through the provider interface.
 */
export class StaticProvider implements EnvProvider {
  readonly name: string
  private readonly values: Readonly<Record<string, string>>

  constructor(values: Readonly<Record<string, string>>, options: StaticProviderOptions = {}) {
    this.name = options.name ?? "static"
    this.values = Object.freeze({ ...values })
  }

  async get(key: string): Promise<string | null> {
    return ownValue(this.values, key)
  }

  async getAll(): Promise<Record<string, string>> {
    return { ...this.values }
  }
}

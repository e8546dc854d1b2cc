import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only keys starting with `prefix` are loaded, with the prefix removed. */
  prefix?: string
  /** @default process.env */
  env?: Readonly<Record<string, string | undefined>>
}

export class EnvSource implements ConfigSource {
  readonly name: string
  private readonly prefix: string
  private readonly env: Readonly<Record<string, string | undefined>>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
    this.name = this.prefix ? `env:${this.prefix}` : "env"
  }

  async load(): Promise<Record<string, string | undefined>> {
    const values: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(this.prefix) && key.length > this.prefix.length) {
        values[key.slice(this.prefix.length)] = value
      }
    }

    return values
  }
}

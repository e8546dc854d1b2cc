import fs from "node:fs/promises"
import path from "node:path"
import { ConfigError } from "../../core/errors"
import { parseDotenv } from "../../core/parse-dotenv"
import type { ConfigSource } from "../../ports/source"

export type DotenvSourceOptions = {
  /**
   * Absolute, or relative to `cwd`.
   *
   * @example ".env", ".env.production", "./config/.env.defaults"
   */
  file: string

  /**
   * - `true`: a missing file rejects with `config_source_missing`.
   * - `false`: a missing file loads as empty.
   */
  required: boolean

  /** @default process.cwd() */
  cwd?: string

  /** Fallback for `${NAME}` references. @default process.env */
  env?: Readonly<Record<string, string | undefined>>
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, string | undefined>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)

    let content: string
    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (!isMissingFile(err)) throw err
      if (this.opts.required) throw ConfigError.sourceMissing({ source: this.name, path: filePath })

      return {}
    }

    return parseDotenv(content, { ...(this.opts.env && { env: this.opts.env }) })
  }
}

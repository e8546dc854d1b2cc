import fs from "node:fs/promises"
import path from "node:path"
import { parseDotenv } from "@envstack/config"
import { ProviderError } from "../../core/errors"
import { ownValue } from "../../core/own-value"
import type { EnvProvider } from "../../ports/provider"

export type DotenvFileProviderOptions = {
  /** Absolute, or relative to `cwd`. */
  path: string

  /** @default process.cwd() */
  cwd?: string

  /**
   * Consulted for `${NAME}` references the file does not define.
   * @default process.env
   */
  env?: Readonly<Record<string, string | undefined>>

  /** @default "file:<path>" */
  name?: string
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

/**
 * Serves a `.env` file read at run time.
 *
 * The file is read and parsed on every call, so edits show up immediately and
 * a missing file fails every call with `file_not_found`.
 */
export class DotenvFileProvider implements EnvProvider {
  readonly name: string
  readonly path: string
  private readonly env: Readonly<Record<string, string | undefined>> | undefined

  constructor(options: DotenvFileProviderOptions) {
    this.path = path.resolve(options.cwd ?? process.cwd(), options.path)
    this.name = options.name ?? `file:${options.path}`
    this.env = options.env
  }

  async get(key: string): Promise<string | null> {
    return ownValue(await this.read(), key)
  }

  async getAll(): Promise<Record<string, string>> {
    return this.read()
  }

  private async read(): Promise<Record<string, string>> {
    let content: string

    try {
      content = await fs.readFile(this.path, "utf-8")
    } catch (err) {
      if (isMissingFile(err)) throw ProviderError.fileNotFound(this.path, err)
      throw err
    }

    return parseDotenv(content, { ...(this.env && { env: this.env }) })
  }
}

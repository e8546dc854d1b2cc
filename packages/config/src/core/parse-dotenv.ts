import { defineOwn, readOwn } from "./record"

export type ParseDotenvOptions = {
  /**
   * Consulted for `${NAME}` references the file has not defined yet.
   * @default process.env
   */
  env?: Readonly<Record<string, string | undefined>>
}

const reference = /\$\{([^}]+)\}/g

function unquote(value: string): string {
  const first = value[0]
  const quoted = (first === '"' || first === "'") && value.endsWith(first)

  return quoted ? value.slice(1, -1) : value
}

/**
 * Parses `.env` text one line at a time.
 *
 * Blank lines and lines starting with `#` are skipped, as are lines without
 * `=` or with an empty key. The key is everything before the first `=`; key
 * and value are trimmed and one pair of matching surrounding quotes is
 * removed. Nothing else is interpreted: `#`, backslashes and `export` are kept
 * as written.
 *
 * A `${NAME}` reference resolves to the value `NAME` has at that line of the
 * file, else to `env[NAME]`, else to the empty string. A later definition of
 * a key replaces the earlier one.
 */
export function parseDotenv(
  content: string,
  options: ParseDotenvOptions = {},
): Record<string, string> {
  const env = options.env ?? process.env
  const result: Record<string, string> = {}

  for (const line of content.split(/\r\n|\r|\n/)) {
    const trimmed = line.trim()
    if (trimmed === "" || trimmed.startsWith("#")) continue

    const eq = trimmed.indexOf("=")
    if (eq === -1) continue

    const key = trimmed.slice(0, eq).trim()
    if (key === "") continue

    const value = unquote(trimmed.slice(eq + 1).trim()).replace(
      reference,
      (_match, name: string) => readOwn(result, name) ?? readOwn(env, name) ?? "",
    )

    defineOwn(result, key, value)
  }

  return result
}

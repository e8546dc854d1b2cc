import { DotenvSource, EnvSource, loadConfig } from "@envstack/config"
import { z } from "zod"
import { DEFAULT_CACHE_TTL_SECONDS, type InfisicalProviderOptions } from "./infisical-provider"

const infisicalEnvSchema = z.object({
  INFISICAL_URL: z.url(),
  INFISICAL_CLIENT_ID: z.string().min(1),
  INFISICAL_CLIENT_SECRET: z.string().min(1),
  INFISICAL_PROJECT: z.string().min(1),
  INFISICAL_ENVIRONMENT: z.string().min(1),
  INFISICAL_SECRET_PATH: z.string().startsWith("/").default("/"),
  INFISICAL_CACHE_TTL_SECONDS: z.coerce.number().nonnegative().default(DEFAULT_CACHE_TTL_SECONDS),
})

export type LoadInfisicalOptionsInput = {
  /** @default process.env */
  env?: Readonly<Record<string, string | undefined>>
  /** Directory holding `file`. @default process.cwd() */
  cwd?: string
  /** Optional dotenv file read before the environment. @default ".env" */
  file?: string
}

/**
 * Reads the `INFISICAL_*` settings from an optional `.env` file and then the
 * process environment (the environment wins), validated with zod.
 * Rejects with `config_invalid` when a required setting is absent.
 */
export async function loadInfisicalOptions(
  input: LoadInfisicalOptionsInput = {},
): Promise<InfisicalProviderOptions> {
  const env = input.env ?? process.env

  const config = await loadConfig({
    schema: infisicalEnvSchema,
    sources: [
      new DotenvSource({
        file: input.file ?? ".env",
        required: false,
        env,
        ...(input.cwd && { cwd: input.cwd }),
      }),
      new EnvSource({ env }),
    ],
  })

  return {
    url: config.get("INFISICAL_URL"),
    clientId: config.get("INFISICAL_CLIENT_ID"),
    clientSecret: config.get("INFISICAL_CLIENT_SECRET"),
    project: config.get("INFISICAL_PROJECT"),
    environment: config.get("INFISICAL_ENVIRONMENT"),
    secretPath: config.get("INFISICAL_SECRET_PATH"),
    cacheTtlSeconds: config.get("INFISICAL_CACHE_TTL_SECONDS"),
  }
}

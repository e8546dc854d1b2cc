import { type Clock, type Expiring, expiresIn, isLive, type Seconds } from "@envstack/clock"
import { createNullLogger, type Logger } from "@envstack/logger"
import { MemorySingleflight, type Singleflight } from "@envstack/singleflight"
import { type ZodType, z } from "zod"
import { ProviderError } from "../../core/errors"
import { ownValue } from "../../core/own-value"
import type { EnvProvider } from "../../ports/provider"
import { rawSecretsResponseSchema, universalAuthResponseSchema } from "./infisical-schemas"

/** Tokens are treated as expired this long before the server says they are. */
export const TOKEN_EXPIRY_MARGIN_SECONDS: Seconds = 60

export const DEFAULT_CACHE_TTL_SECONDS: Seconds = 300

export interface InfisicalProviderOptions {
  /** Base URL of the Infisical instance; a trailing slash is ignored. */
  url: string
  clientId: string
  clientSecret: string
  /** Project (workspace) id. */
  project: string
  /** Environment slug, e.g. "dev" or "prod". */
  environment: string
  /** @default "/" */
  secretPath?: string
  /** @default 300 */
  cacheTtlSeconds?: Seconds
  /** @default "infisical" */
  name?: string
}

export type InfisicalProviderDeps = {
  clock: Clock
  /** @default globalThis.fetch */
  fetch?: typeof fetch
  logger?: Logger
}

type SecretMap = Readonly<Record<string, string>>

/**
 * Serves secrets from Infisical using Universal Auth (machine identity).
 *
 * The access token and the fetched secrets are cached separately: the token
 * until `expiresIn` minus a safety margin, the secrets for `cacheTtlSeconds`.
 * Concurrent callers share one login and one fetch.
 *
 * `clearCache()` and `refreshToken()` detach any request already in flight,
 * so a response that arrives after the reset is handed to its waiting callers
 * but never stored.
 */
export class InfisicalProvider implements EnvProvider {
  readonly name: string

  private readonly baseUrl: string
  private readonly secretPath: string
  private readonly cacheTtlSeconds: Seconds
  private readonly fetchImpl: typeof fetch
  private readonly logger: Logger

  private token: Expiring<string> | null = null
  private secrets: Expiring<SecretMap> | null = null
  private tokenGeneration = 0
  private secretsGeneration = 0

  private readonly logins: Singleflight<Expiring<string>> = new MemorySingleflight()
  private readonly fetches: Singleflight<Expiring<SecretMap>> = new MemorySingleflight()

  constructor(
    private readonly deps: InfisicalProviderDeps,
    private readonly options: InfisicalProviderOptions,
  ) {
    this.name = options.name ?? "infisical"
    this.baseUrl = options.url.replace(/\/+$/, "")
    this.secretPath = options.secretPath ?? "/"
    this.cacheTtlSeconds = options.cacheTtlSeconds ?? DEFAULT_CACHE_TTL_SECONDS
    this.fetchImpl = deps.fetch ?? ((input, init) => fetch(input, init))
    this.logger = (deps.logger ?? createNullLogger()).child({
      component: "infisical",
      provider: this.name,
    })
  }

  async get(key: string): Promise<string | null> {
    return ownValue(await this.loadSecrets(), key)
  }

  async getAll(): Promise<Record<string, string>> {
    return { ...(await this.loadSecrets()) }
  }

  /** Drops cached secrets; the next read fetches again. The token is kept. */
  clearCache(): void {
    this.secrets = null
    this.secretsGeneration++
    this.fetches.forget("secrets")
  }

  /** Discards the current token and logs in again. Cached secrets are kept. */
  async refreshToken(): Promise<void> {
    this.token = null
    this.tokenGeneration++
    this.logins.forget("token")

    await this.accessToken()
  }

  private async loadSecrets(): Promise<SecretMap> {
    if (isLive(this.deps.clock, this.secrets)) return this.secrets.value

    const generation = this.secretsGeneration
    const { value: fetched } = await this.fetches.run("secrets", () => this.fetchSecrets())

    if (generation === this.secretsGeneration) this.secrets = fetched

    return fetched.value
  }

  private async accessToken(): Promise<string> {
    if (isLive(this.deps.clock, this.token)) return this.token.value

    const generation = this.tokenGeneration
    const { value: issued } = await this.logins.run("token", () => this.authenticate())

    if (generation === this.tokenGeneration) this.token = issued

    return issued.value
  }

  private async authenticate(): Promise<Expiring<string>> {
    const url = `${this.baseUrl}/api/v1/auth/universal-auth/login`
    const body = new URLSearchParams({
      clientId: this.options.clientId,
      clientSecret: this.options.clientSecret,
    })

    const response = await this.send(url, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: body.toString(),
    })

    if (response.status !== 200) {
      throw ProviderError.authenticationFailed({
        status: response.status,
        body: await response.text(),
      })
    }

    const auth = await this.decode(url, response, universalAuthResponseSchema)

    this.logger.debug("authenticated", { expiresIn: auth.expiresIn })

    return expiresIn(
      this.deps.clock,
      auth.accessToken,
      auth.expiresIn - TOKEN_EXPIRY_MARGIN_SECONDS,
    )
  }

  private async fetchSecrets(): Promise<Expiring<SecretMap>> {
    const token = await this.accessToken()
    const query = new URLSearchParams({
      workspaceId: this.options.project,
      environment: this.options.environment,
      secretPath: this.secretPath,
    })
    const url = `${this.baseUrl}/api/v3/secrets/raw?${query.toString()}`

    const response = await this.send(url, {
      method: "GET",
      headers: { Authorization: `Bearer ${token}` },
    })

    if (response.status !== 200) {
      throw ProviderError.fetchFailed({ status: response.status, body: await response.text() })
    }

    const { secrets } = await this.decode(url, response, rawSecretsResponseSchema)
    const values = Object.fromEntries(
      secrets.map((s): [string, string] => [s.secretKey, s.secretValue]),
    )

    this.logger.debug("secrets fetched", {
      count: secrets.length,
      environment: this.options.environment,
      secretPath: this.secretPath,
    })

    return expiresIn(this.deps.clock, Object.freeze(values), this.cacheTtlSeconds)
  }

  private async send(url: string, init: RequestInit): Promise<Response> {
    try {
      return await this.fetchImpl(url, init)
    } catch (err) {
      throw ProviderError.invalidResponse({ url }, err)
    }
  }

  private async decode<T>(url: string, response: Response, schema: ZodType<T>): Promise<T> {
    let payload: unknown

    try {
      payload = await response.json()
    } catch (err) {
      throw ProviderError.invalidResponse({ url }, err)
    }

    const result = schema.safeParse(payload)

    if (!result.success) {
      throw ProviderError.invalidResponse({ url, issues: z.prettifyError(result.error) })
    }

    return result.data
  }
}

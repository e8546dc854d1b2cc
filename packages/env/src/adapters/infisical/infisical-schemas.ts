import { z } from "zod"

/** Body of `POST /api/v1/auth/universal-auth/login`. */
export const universalAuthResponseSchema = z.object({
  accessToken: z.string().min(1),
  /** Seconds. */
  expiresIn: z.number(),
  tokenType: z.string(),
})

/** Body of `GET /api/v3/secrets/raw`. */
export const rawSecretsResponseSchema = z.object({
  secrets: z.array(
    z.object({
      secretKey: z.string(),
      secretValue: z.string(),
    }),
  ),
})

export type UniversalAuthResponse = z.infer<typeof universalAuthResponseSchema>
export type RawSecretsResponse = z.infer<typeof rawSecretsResponseSchema>

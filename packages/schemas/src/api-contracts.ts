import {z} from 'zod'

export const ErrorResponseSchema = z
  .object({
    error: z.string().min(1),
    message: z.string(),
    correlation_id: z.string().min(1)
  })
  .strict()

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>

export const HealthResponseSchema = z
  .object({
    status: z.literal('healthy'),
    timestamp: z.number().int()
  })
  .strict()

export const AuthStartResponseSchema = z
  .object({
    auth_url: z.string().url(),
    state: z.string().min(1)
  })
  .strict()

export type AuthStartResponse = z.infer<typeof AuthStartResponseSchema>

export const AuthCallbackQuerySchema = z
  .object({
    code: z.string().min(1).optional(),
    state: z.string().min(1).optional(),
    error: z.string().min(1).optional(),
    error_description: z.string().optional()
  })
  .loose()

export const TokenSetResponseSchema = z
  .object({
    access_token: z.string().min(1),
    refresh_token: z.string().min(1).optional(),
    expires_in: z.number().int().nonnegative().optional(),
    token_type: z.string().min(1)
  })
  .strict()

export type TokenSetResponse = z.infer<typeof TokenSetResponseSchema>

export const AuthRefreshRequestSchema = z
  .object({
    refresh_token: z.string().min(1)
  })
  .strict()

export const SessionCreateRequestSchema = z
  .object({
    access_token: z.string().min(1),
    refresh_token: z.string().min(1).optional()
  })
  .strict()

export type SessionCreateRequest = z.infer<typeof SessionCreateRequestSchema>

export const SessionResponseSchema = z
  .object({
    session_id: z.string().min(1),
    username: z.string().min(1),
    namespace: z.string().min(1),
    workload: z.string().min(1),
    tunnel_url: z.string().min(1),
    session_token: z.string().min(1),
    expires_at: z.string().datetime()
  })
  .strict()

export type SessionResponse = z.infer<typeof SessionResponseSchema>

export const SessionTokenRequestSchema = z
  .object({
    access_token: z.string().min(1)
  })
  .strict()

export const SessionTokenResponseSchema = z
  .object({
    session_id: z.string().min(1),
    session_token: z.string().min(1),
    token_expires_at: z.string().datetime()
  })
  .strict()

export const SessionDeleteResponseSchema = z
  .object({
    message: z.string().min(1)
  })
  .strict()

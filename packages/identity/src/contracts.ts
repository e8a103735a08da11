import {z} from 'zod';

export type FetchLike = (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>;

export type TokenSet = {
  accessToken: string;
  refreshToken?: string;
  expiresIn?: number;
  tokenType: string;
  idToken?: string;
};

/**
 * Who the provider says the bearer of an access token is. Used once to authorize
 * session creation and never persisted.
 */
export type IdentityProof = {
  subject: string;
  email?: string;
  name?: string;
  assertion: Record<string, unknown>;
};

export type LoginStart = {
  authorizationUrl: string;
  flowState: string;
};

export const identityProviderConfigSchema = z
  .object({
    issuer: z.string().url(),
    clientId: z.string().min(1),
    clientSecret: z.string().min(1).optional(),
    redirectUrl: z.string().url(),
    authorizationUrl: z.string().url(),
    tokenUrl: z.string().url(),
    userinfoUrl: z.string().url(),
    jwksUrl: z.string().url().optional(),
    scopes: z.array(z.string().min(1)).min(1),
    extraAuthorizationParams: z.record(z.string(), z.string()).default({}),
    timeoutMs: z.number().int().positive(),
    flowStateTtlSeconds: z.number().int().positive()
  })
  .strict();

export type IdentityProviderConfig = z.input<typeof identityProviderConfigSchema>;

export const tokenEndpointResponseSchema = z
  .object({
    access_token: z.string().min(1),
    refresh_token: z.string().min(1).optional(),
    id_token: z.string().min(1).optional(),
    token_type: z.string().min(1).default('Bearer'),
    expires_in: z
      .union([
        z.number().int().nonnegative(),
        z
          .string()
          .regex(/^\d+$/u)
          .transform(value => Number.parseInt(value, 10))
      ])
      .optional()
  })
  .loose();

export const providerErrorResponseSchema = z
  .object({
    error: z.string().min(1),
    error_description: z.string().optional()
  })
  .loose();

export const userinfoResponseSchema = z
  .object({
    sub: z.string().min(1).optional(),
    email: z.string().min(1).optional(),
    name: z.string().min(1).optional()
  })
  .loose();

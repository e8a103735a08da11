import {randomBytes} from 'node:crypto'

import type {IdentityProviderConfig} from '@tunnel-broker/identity'
import {LogLevelSchema, type LogLevel} from '@tunnel-broker/logging'
import type {WorkloadNaming} from '@tunnel-broker/workload-locator'
import {z} from 'zod'

const numberFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value
  }

  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? value : parsed
}, z.number().int().positive())

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  return trimmed.length === 0 ? undefined : trimmed
}, z.string().optional())

const optionalUrl = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  return trimmed.length === 0 ? undefined : trimmed
}, z.string().url().optional())

const optionalJson = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  if (trimmed.length === 0) {
    return undefined
  }

  try {
    return JSON.parse(trimmed) as unknown
  } catch {
    return Symbol('invalid_json')
  }
}, z.unknown().optional())

const commaList = (raw: string | undefined) =>
  (raw ?? '')
    .split(',')
    .map(value => value.trim())
    .filter(value => value.length > 0)

const parseCorsAllowedOrigins = ({raw, envVarName}: {raw: string | undefined; envVarName: string}) => {
  const origins = commaList(raw)

  for (const origin of origins) {
    let parsed: URL
    try {
      parsed = new URL(origin)
    } catch {
      throw new Error(`${envVarName} contains an invalid URL origin: ${origin}`)
    }

    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new Error(`${envVarName} contains an unsupported origin protocol: ${origin}`)
    }
  }

  return origins
}

const extraAuthParamsSchema = z.record(z.string(), z.string())

const MIN_SECRET_BYTES = 32
const MIN_CREDENTIAL_TTL_SECONDS = 600

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    BROKER_HOST: z.string().default('0.0.0.0'),
    BROKER_PORT: numberFromEnv.default(8080),
    BROKER_PUBLIC_BASE_URL: optionalUrl,
    BROKER_MAX_BODY_BYTES: numberFromEnv.default(64 * 1024),
    BROKER_LOG_LEVEL: optionalString,
    BROKER_LOG_REDACT_EXTRA_KEYS: optionalString,
    BROKER_CORS_ALLOWED_ORIGINS: optionalString,
    SESSION_TOKEN_SECRET: optionalString,
    SESSION_LIFETIME_SECONDS: numberFromEnv.default(3600),
    SESSION_TOKEN_TTL_SECONDS: numberFromEnv.default(900),
    SESSION_SWEEP_INTERVAL_SECONDS: numberFromEnv.default(300),
    CREDENTIAL_TTL_SECONDS: numberFromEnv.default(3600),
    CREDENTIAL_AUDIENCE: z.string().min(1).default('https://kubernetes.default.svc.cluster.local'),
    OIDC_ISSUER: z.string().url().default('https://cilogon.org'),
    OIDC_CLIENT_ID: optionalString,
    OIDC_CLIENT_SECRET: optionalString,
    OIDC_REDIRECT_URL: optionalUrl,
    OIDC_AUTHORIZATION_URL: optionalUrl,
    OIDC_TOKEN_URL: optionalUrl,
    OIDC_USERINFO_URL: optionalUrl,
    OIDC_JWKS_URL: optionalUrl,
    OIDC_SCOPES: z.string().default('openid email profile'),
    OIDC_EXTRA_AUTH_PARAMS_JSON: optionalJson,
    OIDC_TIMEOUT_MS: numberFromEnv.default(30_000),
    OIDC_FLOW_STATE_TTL_SECONDS: numberFromEnv.default(600),
    ORCHESTRATOR_API_URL: optionalUrl,
    ORCHESTRATOR_API_TOKEN: optionalString,
    ORCHESTRATOR_TIMEOUT_MS: numberFromEnv.default(30_000),
    WORKLOAD_READY_TIMEOUT_MS: numberFromEnv.default(300_000),
    WORKLOAD_POLL_INTERVAL_MS: numberFromEnv.default(2_000),
    WORKLOAD_NAME_TEMPLATE: z.string().min(1).default('jupyter-{user}'),
    WORKLOAD_NAMESPACE_TEMPLATE: z.string().min(1).default('user-{user}'),
    WORKLOAD_CONTAINER: optionalString,
    KUBECONFIG: optionalString,
    TUNNEL_IDLE_TIMEOUT_SECONDS: numberFromEnv.default(1800),
    TUNNEL_MAX_MESSAGE_BYTES: numberFromEnv.default(16 * 1024 * 1024)
  })
  .strict()

export type ServiceConfig = {
  nodeEnv: 'development' | 'test' | 'production'
  host: string
  port: number
  publicBaseUrl?: string
  maxBodyBytes: number
  logging: {
    level: LogLevel
    redactExtraKeys: string[]
  }
  corsAllowedOrigins: string[]
  sessions: {
    tokenSecret: Buffer
    lifetimeSeconds: number
    tokenTtlSeconds: number
    sweepIntervalSeconds: number
  }
  credentials: {
    ttlSeconds: number
    audience: string
    kubeconfigPath?: string
  }
  identity: IdentityProviderConfig
  orchestrator: {
    apiUrl: string
    apiToken?: string
    timeoutMs: number
    readyTimeoutMs: number
    pollIntervalMs: number
    naming: WorkloadNaming
  }
  tunnel: {
    idleTimeoutSeconds: number
    maxMessageBytes: number
  }
}

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  BROKER_HOST: env.BROKER_HOST,
  BROKER_PORT: env.BROKER_PORT,
  BROKER_PUBLIC_BASE_URL: env.BROKER_PUBLIC_BASE_URL,
  BROKER_MAX_BODY_BYTES: env.BROKER_MAX_BODY_BYTES,
  BROKER_LOG_LEVEL: env.BROKER_LOG_LEVEL,
  BROKER_LOG_REDACT_EXTRA_KEYS: env.BROKER_LOG_REDACT_EXTRA_KEYS,
  BROKER_CORS_ALLOWED_ORIGINS: env.BROKER_CORS_ALLOWED_ORIGINS,
  SESSION_TOKEN_SECRET: env.SESSION_TOKEN_SECRET,
  SESSION_LIFETIME_SECONDS: env.SESSION_LIFETIME_SECONDS,
  SESSION_TOKEN_TTL_SECONDS: env.SESSION_TOKEN_TTL_SECONDS,
  SESSION_SWEEP_INTERVAL_SECONDS: env.SESSION_SWEEP_INTERVAL_SECONDS,
  CREDENTIAL_TTL_SECONDS: env.CREDENTIAL_TTL_SECONDS,
  CREDENTIAL_AUDIENCE: env.CREDENTIAL_AUDIENCE,
  OIDC_ISSUER: env.OIDC_ISSUER,
  OIDC_CLIENT_ID: env.OIDC_CLIENT_ID,
  OIDC_CLIENT_SECRET: env.OIDC_CLIENT_SECRET,
  OIDC_REDIRECT_URL: env.OIDC_REDIRECT_URL,
  OIDC_AUTHORIZATION_URL: env.OIDC_AUTHORIZATION_URL,
  OIDC_TOKEN_URL: env.OIDC_TOKEN_URL,
  OIDC_USERINFO_URL: env.OIDC_USERINFO_URL,
  OIDC_JWKS_URL: env.OIDC_JWKS_URL,
  OIDC_SCOPES: env.OIDC_SCOPES,
  OIDC_EXTRA_AUTH_PARAMS_JSON: env.OIDC_EXTRA_AUTH_PARAMS_JSON,
  OIDC_TIMEOUT_MS: env.OIDC_TIMEOUT_MS,
  OIDC_FLOW_STATE_TTL_SECONDS: env.OIDC_FLOW_STATE_TTL_SECONDS,
  ORCHESTRATOR_API_URL: env.ORCHESTRATOR_API_URL,
  ORCHESTRATOR_API_TOKEN: env.ORCHESTRATOR_API_TOKEN,
  ORCHESTRATOR_TIMEOUT_MS: env.ORCHESTRATOR_TIMEOUT_MS,
  WORKLOAD_READY_TIMEOUT_MS: env.WORKLOAD_READY_TIMEOUT_MS,
  WORKLOAD_POLL_INTERVAL_MS: env.WORKLOAD_POLL_INTERVAL_MS,
  WORKLOAD_NAME_TEMPLATE: env.WORKLOAD_NAME_TEMPLATE,
  WORKLOAD_NAMESPACE_TEMPLATE: env.WORKLOAD_NAMESPACE_TEMPLATE,
  WORKLOAD_CONTAINER: env.WORKLOAD_CONTAINER,
  KUBECONFIG: env.KUBECONFIG,
  TUNNEL_IDLE_TIMEOUT_SECONDS: env.TUNNEL_IDLE_TIMEOUT_SECONDS,
  TUNNEL_MAX_MESSAGE_BYTES: env.TUNNEL_MAX_MESSAGE_BYTES
})

const parseTokenSecret = ({raw, requireConfigured}: {raw: string | undefined; requireConfigured: boolean}) => {
  if (raw) {
    const secret = Buffer.from(raw, 'utf8')
    if (secret.length < MIN_SECRET_BYTES) {
      throw new Error(`SESSION_TOKEN_SECRET must be at least ${MIN_SECRET_BYTES} bytes`)
    }
    return secret
  }

  if (requireConfigured) {
    throw new Error('SESSION_TOKEN_SECRET is required in production')
  }

  return randomBytes(MIN_SECRET_BYTES)
}

const parseLogLevel = ({raw, nodeEnv}: {raw: string | undefined; nodeEnv: ServiceConfig['nodeEnv']}) => {
  if (!raw) {
    return nodeEnv === 'test' ? 'silent' : 'info'
  }

  const parsed = LogLevelSchema.safeParse(raw.toLowerCase())
  if (!parsed.success) {
    throw new Error(`BROKER_LOG_LEVEL must be one of ${LogLevelSchema.options.join(', ')}`)
  }

  return parsed.data
}

const parseExtraAuthParams = (raw: unknown) => {
  if (raw === undefined) {
    return {}
  }

  if (typeof raw === 'symbol') {
    throw new Error('OIDC_EXTRA_AUTH_PARAMS_JSON must be valid JSON')
  }

  const parsed = extraAuthParamsSchema.safeParse(raw)
  if (!parsed.success) {
    throw new Error('OIDC_EXTRA_AUTH_PARAMS_JSON must be an object of string values')
  }

  return parsed.data
}

const requiredOutsideTest = ({
  value,
  fallback,
  nodeEnv,
  envVarName
}: {
  value: string | undefined
  fallback: string
  nodeEnv: ServiceConfig['nodeEnv']
  envVarName: string
}) => {
  if (value) {
    return value
  }

  if (nodeEnv !== 'test') {
    throw new Error(`${envVarName} is required`)
  }

  return fallback
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = envSchema.parse(toEnvInput(env))
  const nodeEnv = parsed.NODE_ENV

  if (parsed.SESSION_TOKEN_TTL_SECONDS >= parsed.CREDENTIAL_TTL_SECONDS) {
    throw new Error('SESSION_TOKEN_TTL_SECONDS must be less than CREDENTIAL_TTL_SECONDS')
  }

  if (parsed.SESSION_LIFETIME_SECONDS > parsed.CREDENTIAL_TTL_SECONDS) {
    throw new Error('SESSION_LIFETIME_SECONDS must not exceed CREDENTIAL_TTL_SECONDS')
  }

  if (parsed.CREDENTIAL_TTL_SECONDS < MIN_CREDENTIAL_TTL_SECONDS) {
    throw new Error(`CREDENTIAL_TTL_SECONDS must be at least ${MIN_CREDENTIAL_TTL_SECONDS}`)
  }

  const tokenSecret = parseTokenSecret({
    raw: parsed.SESSION_TOKEN_SECRET,
    requireConfigured: nodeEnv === 'production'
  })

  const issuer = parsed.OIDC_ISSUER.replace(/\/+$/u, '')
  const scopes = parsed.OIDC_SCOPES.split(/\s+/u).filter(scope => scope.length > 0)
  if (scopes.length === 0) {
    throw new Error('OIDC_SCOPES must name at least one scope')
  }

  const identity: IdentityProviderConfig = {
    issuer,
    clientId: requiredOutsideTest({
      value: parsed.OIDC_CLIENT_ID,
      fallback: 'test-client',
      nodeEnv,
      envVarName: 'OIDC_CLIENT_ID'
    }),
    ...(parsed.OIDC_CLIENT_SECRET ? {clientSecret: parsed.OIDC_CLIENT_SECRET} : {}),
    redirectUrl: requiredOutsideTest({
      value: parsed.OIDC_REDIRECT_URL,
      fallback: 'http://127.0.0.1:8080/auth/callback',
      nodeEnv,
      envVarName: 'OIDC_REDIRECT_URL'
    }),
    authorizationUrl: parsed.OIDC_AUTHORIZATION_URL ?? `${issuer}/authorize`,
    tokenUrl: parsed.OIDC_TOKEN_URL ?? `${issuer}/oauth2/token`,
    userinfoUrl: parsed.OIDC_USERINFO_URL ?? `${issuer}/oauth2/userinfo`,
    ...(parsed.OIDC_JWKS_URL ? {jwksUrl: parsed.OIDC_JWKS_URL} : {}),
    scopes,
    extraAuthorizationParams: parseExtraAuthParams(parsed.OIDC_EXTRA_AUTH_PARAMS_JSON),
    timeoutMs: parsed.OIDC_TIMEOUT_MS,
    flowStateTtlSeconds: parsed.OIDC_FLOW_STATE_TTL_SECONDS
  }

  return {
    nodeEnv,
    host: parsed.BROKER_HOST,
    port: parsed.BROKER_PORT,
    ...(parsed.BROKER_PUBLIC_BASE_URL ? {publicBaseUrl: parsed.BROKER_PUBLIC_BASE_URL} : {}),
    maxBodyBytes: parsed.BROKER_MAX_BODY_BYTES,
    logging: {
      level: parseLogLevel({raw: parsed.BROKER_LOG_LEVEL, nodeEnv}),
      redactExtraKeys: commaList(parsed.BROKER_LOG_REDACT_EXTRA_KEYS)
    },
    corsAllowedOrigins: parseCorsAllowedOrigins({
      raw: parsed.BROKER_CORS_ALLOWED_ORIGINS,
      envVarName: 'BROKER_CORS_ALLOWED_ORIGINS'
    }),
    sessions: {
      tokenSecret,
      lifetimeSeconds: parsed.SESSION_LIFETIME_SECONDS,
      tokenTtlSeconds: parsed.SESSION_TOKEN_TTL_SECONDS,
      sweepIntervalSeconds: parsed.SESSION_SWEEP_INTERVAL_SECONDS
    },
    credentials: {
      ttlSeconds: parsed.CREDENTIAL_TTL_SECONDS,
      audience: parsed.CREDENTIAL_AUDIENCE,
      ...(parsed.KUBECONFIG ? {kubeconfigPath: parsed.KUBECONFIG} : {})
    },
    identity,
    orchestrator: {
      apiUrl: requiredOutsideTest({
        value: parsed.ORCHESTRATOR_API_URL,
        fallback: 'http://127.0.0.1:8081/hub/api',
        nodeEnv,
        envVarName: 'ORCHESTRATOR_API_URL'
      }),
      ...(parsed.ORCHESTRATOR_API_TOKEN ? {apiToken: parsed.ORCHESTRATOR_API_TOKEN} : {}),
      timeoutMs: parsed.ORCHESTRATOR_TIMEOUT_MS,
      readyTimeoutMs: parsed.WORKLOAD_READY_TIMEOUT_MS,
      pollIntervalMs: parsed.WORKLOAD_POLL_INTERVAL_MS,
      naming: {
        workloadNameTemplate: parsed.WORKLOAD_NAME_TEMPLATE,
        namespaceTemplate: parsed.WORKLOAD_NAMESPACE_TEMPLATE,
        ...(parsed.WORKLOAD_CONTAINER ? {container: parsed.WORKLOAD_CONTAINER} : {})
      }
    },
    tunnel: {
      idleTimeoutSeconds: parsed.TUNNEL_IDLE_TIMEOUT_SECONDS,
      maxMessageBytes: parsed.TUNNEL_MAX_MESSAGE_BYTES
    }
  }
}

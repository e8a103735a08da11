import {createRemoteJWKSet} from 'jose';
import type {z} from 'zod';

import {
  identityProviderConfigSchema,
  providerErrorResponseSchema,
  tokenEndpointResponseSchema,
  userinfoResponseSchema,
  type FetchLike,
  type IdentityProof,
  type IdentityProviderConfig,
  type LoginStart,
  type TokenSet
} from './contracts';
import {err, ok, type IdentityResult} from './errors';
import {openFlowState, sealFlowState} from './flowState';
import {verifyIdToken, type IdTokenKeyResolver} from './idToken';
import {createAntiReplayState, createPkcePair, PKCE_CHALLENGE_METHOD} from './pkce';

export type IdentityExchange = {
  startLogin: () => LoginStart;
  completeLogin: (input: {code: string; flowState: string}) => Promise<IdentityResult<TokenSet>>;
  validateAccess: (accessToken: string) => Promise<IdentityResult<IdentityProof>>;
  refresh: (refreshToken: string) => Promise<IdentityResult<TokenSet>>;
};

export type CreateIdentityExchangeInput = {
  config: IdentityProviderConfig;
  flowStateKey: Buffer;
  fetchImpl?: FetchLike;
  idTokenKeyResolver?: IdTokenKeyResolver;
  now?: () => Date;
};

const describeFetchError = (error: unknown) => {
  if (error instanceof Error) {
    if (error.name === 'TimeoutError' || error.name === 'AbortError') {
      return 'Identity provider request timed out';
    }

    return `Identity provider request failed: ${error.message}`;
  }

  return 'Identity provider request failed';
};

const readJson = async (response: Response): Promise<{ok: true; body: unknown} | {ok: false}> => {
  try {
    return {ok: true, body: (await response.json()) as unknown};
  } catch {
    return {ok: false};
  }
};

export const createIdentityExchange = ({
  config: rawConfig,
  flowStateKey,
  fetchImpl = fetch,
  idTokenKeyResolver,
  now = () => new Date()
}: CreateIdentityExchangeInput): IdentityExchange => {
  const config = identityProviderConfigSchema.parse(rawConfig);
  if (flowStateKey.length < 32) {
    throw new Error('Flow state key must be at least 32 bytes');
  }

  const keyResolver: IdTokenKeyResolver | undefined =
    idTokenKeyResolver ?? (config.jwksUrl ? createRemoteJWKSet(new URL(config.jwksUrl)) : undefined);

  const callProvider = async (url: string, init: RequestInit): Promise<IdentityResult<Response>> => {
    try {
      return ok(
        await fetchImpl(url, {
          ...init,
          signal: AbortSignal.timeout(config.timeoutMs)
        })
      );
    } catch (error) {
      return err('provider_unreachable', describeFetchError(error));
    }
  };

  const describeRejection = async (response: Response, fallback: string) => {
    const body = await readJson(response);
    if (!body.ok) {
      return `${fallback} (status ${response.status})`;
    }

    const parsed = providerErrorResponseSchema.safeParse(body.body);
    if (!parsed.success) {
      return `${fallback} (status ${response.status})`;
    }

    return parsed.data.error_description ?? parsed.data.error;
  };

  const toTokenSet = (body: z.infer<typeof tokenEndpointResponseSchema>): TokenSet => ({
    accessToken: body.access_token,
    tokenType: body.token_type,
    ...(body.refresh_token ? {refreshToken: body.refresh_token} : {}),
    ...(body.expires_in !== undefined ? {expiresIn: body.expires_in} : {}),
    ...(body.id_token ? {idToken: body.id_token} : {})
  });

  const requestTokens = async (form: URLSearchParams): Promise<IdentityResult<TokenSet>> => {
    form.set('client_id', config.clientId);
    if (config.clientSecret) {
      form.set('client_secret', config.clientSecret);
    }

    const response = await callProvider(config.tokenUrl, {
      method: 'POST',
      headers: {
        'content-type': 'application/x-www-form-urlencoded',
        accept: 'application/json'
      },
      body: form.toString()
    });
    if (!response.ok) {
      return response;
    }

    if (!response.value.ok) {
      return err('provider_rejected', await describeRejection(response.value, 'Token exchange was rejected'));
    }

    const body = await readJson(response.value);
    const parsed = body.ok ? tokenEndpointResponseSchema.safeParse(body.body) : undefined;
    if (!parsed?.success) {
      return err('malformed_provider_response', 'Token endpoint returned an unusable payload');
    }

    const tokens = toTokenSet(parsed.data);
    if (tokens.idToken && keyResolver) {
      const verified = await verifyIdToken({
        token: tokens.idToken,
        keyResolver,
        expectedIssuer: config.issuer,
        clientId: config.clientId,
        now: now()
      });
      if (!verified.ok) {
        return err('token_rejected', `ID token failed verification: ${verified.error}`);
      }
    }

    return ok(tokens);
  };

  const startLogin = (): LoginStart => {
    const {codeVerifier, codeChallenge} = createPkcePair();
    const state = createAntiReplayState();

    const authorizationUrl = new URL(config.authorizationUrl);
    for (const [name, value] of Object.entries(config.extraAuthorizationParams)) {
      authorizationUrl.searchParams.set(name, value);
    }
    authorizationUrl.searchParams.set('response_type', 'code');
    authorizationUrl.searchParams.set('client_id', config.clientId);
    authorizationUrl.searchParams.set('redirect_uri', config.redirectUrl);
    authorizationUrl.searchParams.set('scope', config.scopes.join(' '));
    authorizationUrl.searchParams.set('state', state);
    authorizationUrl.searchParams.set('code_challenge', codeChallenge);
    authorizationUrl.searchParams.set('code_challenge_method', PKCE_CHALLENGE_METHOD);

    return {
      authorizationUrl: authorizationUrl.toString(),
      flowState: sealFlowState({
        key: flowStateKey,
        state,
        codeVerifier,
        now: now(),
        ttlSeconds: config.flowStateTtlSeconds
      })
    };
  };

  const completeLogin: IdentityExchange['completeLogin'] = async ({code, flowState}) => {
    const opened = openFlowState({key: flowStateKey, flowState, now: now()});
    if (!opened.ok) {
      return opened;
    }

    return requestTokens(
      new URLSearchParams({
        grant_type: 'authorization_code',
        code,
        redirect_uri: config.redirectUrl,
        code_verifier: opened.value.code_verifier
      })
    );
  };

  const validateAccess: IdentityExchange['validateAccess'] = async accessToken => {
    const response = await callProvider(config.userinfoUrl, {
      method: 'GET',
      headers: {
        authorization: `Bearer ${accessToken}`,
        accept: 'application/json'
      }
    });
    if (!response.ok) {
      return response;
    }

    if (!response.value.ok) {
      return err('token_rejected', await describeRejection(response.value, 'Access token was rejected'));
    }

    const body = await readJson(response.value);
    const parsed = body.ok ? userinfoResponseSchema.safeParse(body.body) : undefined;
    if (!parsed?.success) {
      return err('malformed_provider_response', 'Userinfo endpoint returned an unusable payload');
    }

    const subject = parsed.data.email ?? parsed.data.sub;
    if (!subject) {
      return err('malformed_provider_response', 'Userinfo response names no subject');
    }

    return ok({
      subject,
      ...(parsed.data.email ? {email: parsed.data.email} : {}),
      ...(parsed.data.name ? {name: parsed.data.name} : {}),
      assertion: parsed.data
    });
  };

  const refresh: IdentityExchange['refresh'] = async refreshToken => {
    const result = await requestTokens(
      new URLSearchParams({
        grant_type: 'refresh_token',
        refresh_token: refreshToken
      })
    );
    if (!result.ok || result.value.refreshToken) {
      return result;
    }

    return ok({...result.value, refreshToken});
  };

  return {startLogin, completeLogin, validateAccess, refresh};
};

import {decodeProtectedHeader, jwtVerify, type JWTPayload, type JWTVerifyGetKey} from 'jose';

const ALLOWED_ID_TOKEN_ALGORITHMS = new Set([
  'RS256',
  'RS384',
  'RS512',
  'PS256',
  'PS384',
  'PS512',
  'ES256',
  'ES384',
  'ES512',
  'EDDSA'
]);

const MAX_ID_TOKEN_LENGTH = 16_384;

export type IdTokenKeyResolver = JWTVerifyGetKey;

export type VerifyIdTokenResult =
  | {ok: true; payload: JWTPayload}
  | {ok: false; error: string};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const mapJoseVerifyError = (error: unknown) => {
  const code = isRecord(error) && typeof error.code === 'string' ? error.code : null;

  switch (code) {
    case 'ERR_JWT_EXPIRED':
      return 'id_token_expired';
    case 'ERR_JWS_SIGNATURE_VERIFICATION_FAILED':
    case 'ERR_JWKS_NO_MATCHING_KEY':
    case 'ERR_JWKS_MULTIPLE_MATCHING_KEYS':
      return 'id_token_signature_invalid';
    case 'ERR_JWT_CLAIM_VALIDATION_FAILED':
      return 'id_token_claims_invalid';
    default:
      return 'id_token_invalid';
  }
};

const toAudienceList = (value: JWTPayload['aud']) => {
  if (typeof value === 'string') {
    return [value];
  }

  return Array.isArray(value) ? value : [];
};

/**
 * Verifies an OIDC ID token returned next to the access token: signature against the
 * provider's key set, asymmetric algorithm, issuer, audience (the client id) and, when
 * there are several audiences, an `azp` naming the client.
 */
export const verifyIdToken = async ({
  token,
  keyResolver,
  expectedIssuer,
  clientId,
  now = new Date(),
  clockToleranceSeconds = 60
}: {
  token: string;
  keyResolver: IdTokenKeyResolver;
  expectedIssuer: string;
  clientId: string;
  now?: Date;
  clockToleranceSeconds?: number;
}): Promise<VerifyIdTokenResult> => {
  const normalized = token.trim();
  if (normalized.length === 0 || normalized.length > MAX_ID_TOKEN_LENGTH) {
    return {ok: false, error: 'id_token_invalid'};
  }

  let algorithm: string | undefined;
  try {
    algorithm = decodeProtectedHeader(normalized).alg;
  } catch {
    return {ok: false, error: 'id_token_invalid'};
  }

  if (!algorithm || !ALLOWED_ID_TOKEN_ALGORITHMS.has(algorithm.toUpperCase())) {
    return {ok: false, error: 'id_token_alg_not_allowed'};
  }

  let payload: JWTPayload;
  try {
    const verified = await jwtVerify(normalized, keyResolver, {
      currentDate: now,
      clockTolerance: clockToleranceSeconds
    });
    payload = verified.payload;
  } catch (error) {
    return {ok: false, error: mapJoseVerifyError(error)};
  }

  if (payload.iss !== expectedIssuer) {
    return {ok: false, error: 'id_token_issuer_mismatch'};
  }

  const audience = toAudienceList(payload.aud);
  if (!audience.includes(clientId)) {
    return {ok: false, error: 'id_token_audience_mismatch'};
  }

  if (audience.length > 1 && payload.azp !== clientId) {
    return {ok: false, error: 'id_token_azp_mismatch'};
  }

  return {ok: true, payload};
};

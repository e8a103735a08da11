import {randomUUID} from 'node:crypto';

import {errors, jwtVerify, SignJWT} from 'jose';
import {z} from 'zod';

const SESSION_TOKEN_ALGORITHM = 'HS256';
const MIN_SECRET_BYTES = 32;

const sessionTokenClaimsSchema = z.object({
  sid: z.string().min(1),
  sub: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int()
});

export type SessionTokenClaims = z.infer<typeof sessionTokenClaimsSchema>;

export type SessionTokenVerification =
  | {ok: true; claims: SessionTokenClaims}
  | {ok: false; reason: 'expired' | 'invalid'};

export const assertSessionSecret = (secret: Uint8Array) => {
  if (secret.byteLength < MIN_SECRET_BYTES) {
    throw new Error(`Session token secret must be at least ${MIN_SECRET_BYTES} bytes`);
  }
};

export const signSessionToken = async ({
  secret,
  sessionId,
  subject,
  issuedAt,
  expiresAt
}: {
  secret: Uint8Array;
  sessionId: string;
  subject: string;
  issuedAt: Date;
  expiresAt: Date;
}) =>
  new SignJWT({sid: sessionId})
    .setProtectedHeader({alg: SESSION_TOKEN_ALGORITHM, typ: 'JWT'})
    .setSubject(subject)
    .setJti(randomUUID())
    .setIssuedAt(Math.floor(issuedAt.getTime() / 1000))
    .setExpirationTime(Math.floor(expiresAt.getTime() / 1000))
    .sign(secret);

export const verifySessionToken = async ({
  secret,
  token,
  now
}: {
  secret: Uint8Array;
  token: string;
  now: Date;
}): Promise<SessionTokenVerification> => {
  try {
    const {payload} = await jwtVerify(token, secret, {
      algorithms: [SESSION_TOKEN_ALGORITHM],
      currentDate: now
    });
    const claims = sessionTokenClaimsSchema.safeParse(payload);
    return claims.success ? {ok: true, claims: claims.data} : {ok: false, reason: 'invalid'};
  } catch (error) {
    if (error instanceof errors.JWTExpired) {
      return {ok: false, reason: 'expired'};
    }

    return {ok: false, reason: 'invalid'};
  }
};

import {createHash, randomBytes} from 'node:crypto';

export const PKCE_CHALLENGE_METHOD = 'S256';

const VERIFIER_BYTES = 64;
const STATE_BYTES = 32;

export const createRandomToken = (byteLength: number) => randomBytes(byteLength).toString('base64url');

export const deriveCodeChallenge = (codeVerifier: string) =>
  createHash('sha256').update(codeVerifier, 'ascii').digest('base64url');

// 64 random bytes encode to an 86-character verifier, inside the 43..128 range RFC 7636 allows.
export const createPkcePair = () => {
  const codeVerifier = createRandomToken(VERIFIER_BYTES);
  return {
    codeVerifier,
    codeChallenge: deriveCodeChallenge(codeVerifier)
  };
};

export const createAntiReplayState = () => createRandomToken(STATE_BYTES);

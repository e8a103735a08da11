export {
  identityProviderConfigSchema,
  type FetchLike,
  type IdentityProof,
  type IdentityProviderConfig,
  type LoginStart,
  type TokenSet
} from './contracts';
export {
  err,
  identityErrorCodeSchema,
  ok,
  type IdentityError,
  type IdentityErrorCode,
  type IdentityResult
} from './errors';
export {createIdentityExchange, type CreateIdentityExchangeInput, type IdentityExchange} from './exchange';
export {openFlowState, sealFlowState, type FlowStatePayload} from './flowState';
export {verifyIdToken, type IdTokenKeyResolver, type VerifyIdTokenResult} from './idToken';
export {createPkcePair, deriveCodeChallenge, PKCE_CHALLENGE_METHOD} from './pkce';

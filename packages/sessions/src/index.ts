export type {Session, SessionEndedEvent, SessionEndedListener, SessionEndReason, SessionIdentity} from './contracts';
export {err, ok, sessionErrorCodeSchema, type SessionError, type SessionErrorCode, type SessionResult} from './errors';
export {SessionRegistry, type SessionRegistryOptions} from './registry';
export {assertSessionSecret, signSessionToken, verifySessionToken, type SessionTokenClaims} from './sessionToken';

import {randomUUID} from 'node:crypto';

import type {ClusterCredentialIssuer, ScopedCredential} from '@tunnel-broker/credentials';
import {createNoopLogger, type StructuredLogger} from '@tunnel-broker/logging';
import type {WorkloadLocation} from '@tunnel-broker/workload-locator';

import type {Session, SessionEndedListener, SessionEndReason, SessionIdentity} from './contracts';
import {err, ok, type SessionResult} from './errors';
import {assertSessionSecret, signSessionToken, verifySessionToken} from './sessionToken';

export type SessionRegistryOptions = {
  issuer: ClusterCredentialIssuer;
  tokenSecret: Uint8Array;
  sessionLifetimeSeconds: number;
  tokenTtlSeconds: number;
  logger?: StructuredLogger;
  now?: () => Date;
  generateId?: () => string;
};

const NOT_FOUND_MESSAGE = 'Session not found';

/**
 * Owns every live session and the credential each one holds. Map mutations never
 * straddle an await, so two racing deletes cannot both observe the same record and
 * the credential is revoked exactly once.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();
  private readonly tokenIndex = new Map<string, string>();
  private readonly listeners = new Set<SessionEndedListener>();
  private readonly issuer: ClusterCredentialIssuer;
  private readonly tokenSecret: Uint8Array;
  private readonly sessionLifetimeMs: number;
  private readonly tokenTtlMs: number;
  private readonly logger: StructuredLogger;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private sweepTimer: NodeJS.Timeout | undefined;

  constructor(options: SessionRegistryOptions) {
    assertSessionSecret(options.tokenSecret);
    if (options.tokenTtlSeconds <= 0 || options.sessionLifetimeSeconds <= 0) {
      throw new Error('Session lifetime and token TTL must be positive');
    }

    this.issuer = options.issuer;
    this.tokenSecret = options.tokenSecret;
    this.sessionLifetimeMs = options.sessionLifetimeSeconds * 1000;
    this.tokenTtlMs = options.tokenTtlSeconds * 1000;
    this.logger = options.logger ?? createNoopLogger();
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  get size() {
    return this.sessions.size;
  }

  async create({
    identity,
    workload,
    refreshToken
  }: {
    identity: SessionIdentity;
    workload: WorkloadLocation;
    refreshToken?: string;
  }): Promise<SessionResult<Session>> {
    const minted = await this.issuer.mint(workload);
    if (!minted.ok) {
      return err('credential_mint_failed', minted.error.message, minted.error.code);
    }

    const credential = minted.value;
    const createdAt = this.now();
    const lifetimeEnd = createdAt.getTime() + this.sessionLifetimeMs;
    const expiresAt = new Date(Math.min(lifetimeEnd, credential.expiresAt.getTime()));
    let id: string;
    let issued: {token: string; expiresAt: Date};
    try {
      id = this.generateId();
      issued = await this.issueToken({id, subject: identity.subject, issuedAt: createdAt, sessionExpiresAt: expiresAt});
    } catch (error) {
      // No session holds the credential yet.
      await this.revokeCredential(credential);
      throw error;
    }

    const session: Session = {
      id,
      identity,
      workload,
      credential,
      sessionToken: issued.token,
      tokenExpiresAt: issued.expiresAt,
      ...(refreshToken ? {refreshToken} : {}),
      createdAt,
      expiresAt
    };

    this.sessions.set(id, session);
    this.tokenIndex.set(session.sessionToken, id);

    this.logger.info({
      event: 'session.create.success',
      component: 'sessions.registry',
      message: 'Session created',
      session_id: id,
      user: identity.subject,
      workload: workload.workloadName,
      metadata: {namespace: workload.namespace, expires_at: expiresAt.toISOString()}
    });

    return ok(session);
  }

  get(sessionId: string): SessionResult<Session> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return err('session_not_found', NOT_FOUND_MESSAGE);
    }

    if (this.isExpired(session)) {
      return err('session_expired', 'Session has expired');
    }

    return ok(session);
  }

  /** Milliseconds until the session expires; zero once it has expired or ended. */
  remainingLifetimeMs(sessionId: string) {
    const session = this.sessions.get(sessionId);
    return session ? Math.max(0, session.expiresAt.getTime() - this.now().getTime()) : 0;
  }

  /**
   * Resolves a session from its bearer token. Every failure, whether a bad signature,
   * an expired token, a rotated token or a missing session, yields the same error.
   */
  async getByToken(token: string): Promise<SessionResult<Session>> {
    const verified = await verifySessionToken({secret: this.tokenSecret, token, now: this.now()});
    const indexedId = this.tokenIndex.get(token);
    if (!verified.ok || indexedId === undefined || verified.claims.sid !== indexedId) {
      return err('session_not_found', NOT_FOUND_MESSAGE);
    }

    const session = this.sessions.get(indexedId);
    if (!session || this.isExpired(session) || session.sessionToken !== token) {
      return err('session_not_found', NOT_FOUND_MESSAGE);
    }

    return ok(session);
  }

  async reissueToken(sessionId: string): Promise<SessionResult<Session>> {
    const current = this.get(sessionId);
    if (!current.ok) {
      return current;
    }

    const issued = await this.issueToken({
      id: sessionId,
      subject: current.value.identity.subject,
      issuedAt: this.now(),
      sessionExpiresAt: current.value.expiresAt
    });

    // The session may have been deleted while signing.
    const latest = this.sessions.get(sessionId);
    if (!latest) {
      return err('session_not_found', NOT_FOUND_MESSAGE);
    }

    const rotated: Session = {...latest, sessionToken: issued.token, tokenExpiresAt: issued.expiresAt};
    this.tokenIndex.delete(latest.sessionToken);
    this.tokenIndex.set(rotated.sessionToken, sessionId);
    this.sessions.set(sessionId, rotated);

    return ok(rotated);
  }

  async delete(sessionId: string, reason: SessionEndReason = 'explicit'): Promise<SessionResult<Session>> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return err('session_not_found', NOT_FOUND_MESSAGE);
    }

    this.sessions.delete(sessionId);
    this.tokenIndex.delete(session.sessionToken);

    this.logger.info({
      event: 'session.delete',
      component: 'sessions.registry',
      message: 'Session ended',
      session_id: sessionId,
      user: session.identity.subject,
      workload: session.workload.workloadName,
      reason_code: reason
    });

    this.notifyEnded({session, reason});
    await this.revokeCredential(session.credential, session.id);

    return ok(session);
  }

  async sweepExpired() {
    const expired = [...this.sessions.values()].filter(session => this.isExpired(session));
    const results = await Promise.all(expired.map(session => this.delete(session.id, 'expired')));
    const removed = results.filter(result => result.ok).length;

    if (removed > 0) {
      this.logger.info({
        event: 'session.sweep.expired',
        component: 'sessions.registry',
        message: 'Expired sessions removed',
        metadata: {removed}
      });
    }

    return removed;
  }

  async deleteAll(reason: SessionEndReason = 'shutdown') {
    const ids = [...this.sessions.keys()];
    await Promise.all(ids.map(id => this.delete(id, reason)));
  }

  onSessionEnded(listener: SessionEndedListener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  startSweeper(intervalMs: number) {
    this.stopSweeper();
    this.sweepTimer = setInterval(() => {
      this.sweepExpired().catch((error: unknown) => {
        this.logger.error({
          event: 'session.sweep.failed',
          component: 'sessions.registry',
          message: 'Expiry sweep failed',
          reason_code: 'sweep_failed',
          metadata: {error}
        });
      });
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stopSweeper() {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  private isExpired(session: Session) {
    return this.now().getTime() >= session.expiresAt.getTime();
  }

  private async issueToken({
    id,
    subject,
    issuedAt,
    sessionExpiresAt
  }: {
    id: string;
    subject: string;
    issuedAt: Date;
    sessionExpiresAt: Date;
  }) {
    const expiresAt = new Date(Math.min(issuedAt.getTime() + this.tokenTtlMs, sessionExpiresAt.getTime()));
    const token = await signSessionToken({secret: this.tokenSecret, sessionId: id, subject, issuedAt, expiresAt});
    return {token, expiresAt};
  }

  private notifyEnded(event: {session: Session; reason: SessionEndReason}) {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error({
          event: 'session.listener.failed',
          component: 'sessions.registry',
          message: 'Session-ended listener threw',
          session_id: event.session.id,
          reason_code: 'listener_failed',
          metadata: {error}
        });
      }
    }
  }

  private async revokeCredential(credential: ScopedCredential, sessionId?: string) {
    try {
      await this.issuer.revoke(credential);
    } catch (error) {
      this.logger.error({
        event: 'credentials.revoke.failed',
        component: 'sessions.registry',
        message: 'Credential revocation threw',
        ...(sessionId ? {session_id: sessionId} : {}),
        reason_code: 'revoke_failed',
        metadata: {principal: credential.handle.principalName, error}
      });
    }
  }
}

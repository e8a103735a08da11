import type {ScopedCredential} from '@tunnel-broker/credentials';
import type {WorkloadLocation} from '@tunnel-broker/workload-locator';

export type SessionIdentity = {
  subject: string;
  email?: string;
  name?: string;
};

export type Session = {
  id: string;
  identity: SessionIdentity;
  workload: WorkloadLocation;
  credential: ScopedCredential;
  sessionToken: string;
  tokenExpiresAt: Date;
  refreshToken?: string;
  createdAt: Date;
  expiresAt: Date;
};

export type SessionEndReason = 'explicit' | 'expired' | 'tunnel_closed' | 'shutdown';

export type SessionEndedEvent = {
  session: Session;
  reason: SessionEndReason;
};

export type SessionEndedListener = (event: SessionEndedEvent) => void;

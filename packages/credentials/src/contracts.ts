import type {WorkloadLocation} from '@tunnel-broker/workload-locator';

import type {CredentialResult} from './errors';

/** Everything needed to tear a credential down again, recorded at mint time. */
export type CredentialHandle = {
  namespace: string;
  principalName: string;
  bindingName: string;
  roleName: string;
};

export type ClusterEndpoint = {
  server: string;
  caData?: string;
  caFile?: string;
  skipTLSVerify?: boolean;
};

export type ScopedCredential = {
  handle: CredentialHandle;
  token: string;
  expiresAt: Date;
  workload: WorkloadLocation;
  cluster: ClusterEndpoint;
};

export type ClusterCredentialIssuer = {
  mint: (workload: WorkloadLocation) => Promise<CredentialResult<ScopedCredential>>;
  revoke: (credential: ScopedCredential) => Promise<void>;
};

export const PRINCIPAL_NAME_PREFIX = 'tunnel-session-';
export const ROLE_NAME_PREFIX = 'tunnel-workload-';

import type {WorkloadLocation} from '@tunnel-broker/workload-locator';

import {
  PRINCIPAL_NAME_PREFIX,
  ROLE_NAME_PREFIX,
  type ClusterCredentialIssuer,
  type ClusterEndpoint,
  type ScopedCredential
} from './contracts';
import {err, ok, type CredentialErrorCode} from './errors';

export type InMemoryCredentialIssuer = ClusterCredentialIssuer & {
  livePrincipals: () => string[];
  revocations: () => string[];
  failNextMint: (code: CredentialErrorCode) => void;
};

/**
 * Issuer that keeps principals in a set. Used by the broker's tests and by local
 * development runs without a cluster.
 */
export const createInMemoryCredentialIssuer = ({
  ttlSeconds = 3600,
  cluster = {server: 'https://cluster.invalid'},
  now = () => new Date()
}: {
  ttlSeconds?: number;
  cluster?: ClusterEndpoint;
  now?: () => Date;
} = {}): InMemoryCredentialIssuer => {
  const principals = new Set<string>();
  const revoked: string[] = [];
  let pendingFailure: CredentialErrorCode | undefined;
  let sequence = 0;

  const mint = async (workload: WorkloadLocation) => {
    if (pendingFailure) {
      const code = pendingFailure;
      pendingFailure = undefined;
      return err(code, `Injected ${code}`);
    }

    sequence += 1;
    const principalName = `${PRINCIPAL_NAME_PREFIX}${sequence}`;
    principals.add(`${workload.namespace}/${principalName}`);

    const credential: ScopedCredential = {
      handle: {
        namespace: workload.namespace,
        principalName,
        bindingName: principalName,
        roleName: `${ROLE_NAME_PREFIX}${workload.workloadName}`
      },
      token: `memory-token-${sequence}`,
      expiresAt: new Date(now().getTime() + ttlSeconds * 1000),
      workload,
      cluster
    };
    return ok(credential);
  };

  const revoke = async ({handle}: ScopedCredential) => {
    revoked.push(handle.principalName);
    principals.delete(`${handle.namespace}/${handle.principalName}`);
  };

  return {
    mint,
    revoke,
    livePrincipals: () => [...principals],
    revocations: () => [...revoked],
    failNextMint: code => {
      pendingFailure = code;
    }
  };
};

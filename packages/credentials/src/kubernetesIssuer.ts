import {randomUUID} from 'node:crypto';

import {
  CoreV1Api,
  KubeConfig,
  RbacAuthorizationV1Api,
  type V1PolicyRule
} from '@kubernetes/client-node';
import {createNoopLogger, type StructuredLogger} from '@tunnel-broker/logging';
import type {WorkloadLocation} from '@tunnel-broker/workload-locator';

import {
  PRINCIPAL_NAME_PREFIX,
  ROLE_NAME_PREFIX,
  type ClusterCredentialIssuer,
  type ClusterEndpoint,
  type CredentialHandle,
  type ScopedCredential
} from './contracts';
import {clusterStatusOf, describeClusterError, err, ok} from './errors';

export type CoreApi = Pick<
  CoreV1Api,
  'createNamespacedServiceAccount' | 'createNamespacedServiceAccountToken' | 'deleteNamespacedServiceAccount'
>;

export type RbacApi = Pick<
  RbacAuthorizationV1Api,
  'createNamespacedRole' | 'createNamespacedRoleBinding' | 'deleteNamespacedRoleBinding'
>;

export type KubernetesCredentialIssuerOptions = {
  core: CoreApi;
  rbac: RbacApi;
  cluster: ClusterEndpoint;
  tokenTtlSeconds: number;
  audience: string;
  logger?: StructuredLogger;
  now?: () => Date;
  generateId?: () => string;
};

const MANAGED_BY_LABEL = {'app.kubernetes.io/managed-by': 'tunnel-broker'};

export const workloadPolicyRules = (workloadName: string): V1PolicyRule[] => [
  {
    apiGroups: [''],
    resources: ['pods'],
    verbs: ['get'],
    resourceNames: [workloadName]
  },
  {
    apiGroups: [''],
    resources: ['pods/exec', 'pods/portforward', 'pods/log'],
    verbs: ['create', 'get'],
    resourceNames: [workloadName]
  }
];

const isNotFound = (error: unknown) => clusterStatusOf(error) === 404;

export class KubernetesCredentialIssuer implements ClusterCredentialIssuer {
  private readonly core: CoreApi;
  private readonly rbac: RbacApi;
  private readonly cluster: ClusterEndpoint;
  private readonly tokenTtlSeconds: number;
  private readonly audience: string;
  private readonly logger: StructuredLogger;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: KubernetesCredentialIssuerOptions) {
    if (!Number.isInteger(options.tokenTtlSeconds) || options.tokenTtlSeconds < 600) {
      throw new Error('Credential token TTL must be an integer of at least 600 seconds');
    }

    this.core = options.core;
    this.rbac = options.rbac;
    this.cluster = options.cluster;
    this.tokenTtlSeconds = options.tokenTtlSeconds;
    this.audience = options.audience;
    this.logger = options.logger ?? createNoopLogger();
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  async mint(workload: WorkloadLocation) {
    const principalName = `${PRINCIPAL_NAME_PREFIX}${this.generateId()}`;
    const handle: CredentialHandle = {
      namespace: workload.namespace,
      principalName,
      bindingName: principalName,
      roleName: `${ROLE_NAME_PREFIX}${workload.workloadName}`
    };

    try {
      await this.core.createNamespacedServiceAccount({
        namespace: handle.namespace,
        body: {metadata: {name: principalName, namespace: handle.namespace, labels: MANAGED_BY_LABEL}}
      });
    } catch (error) {
      return this.failMint({
        handle,
        code: 'principal_create_failed',
        message: `Failed to create service account ${principalName}: ${describeClusterError(error)}`,
        created: {principal: false, binding: false}
      });
    }

    try {
      await this.ensureRole(handle, workload.workloadName);
      await this.rbac.createNamespacedRoleBinding({
        namespace: handle.namespace,
        body: {
          metadata: {name: handle.bindingName, namespace: handle.namespace, labels: MANAGED_BY_LABEL},
          subjects: [{kind: 'ServiceAccount', name: principalName, namespace: handle.namespace}],
          roleRef: {apiGroup: 'rbac.authorization.k8s.io', kind: 'Role', name: handle.roleName}
        }
      });
    } catch (error) {
      return this.failMint({
        handle,
        code: 'binding_failed',
        message: `Failed to bind ${principalName} to ${handle.roleName}: ${describeClusterError(error)}`,
        created: {principal: true, binding: false}
      });
    }

    let token: string | undefined;
    let expiresAt: Date | undefined;
    try {
      const issued = await this.core.createNamespacedServiceAccountToken({
        name: principalName,
        namespace: handle.namespace,
        body: {spec: {audiences: [this.audience], expirationSeconds: this.tokenTtlSeconds}}
      });
      token = issued.status?.token;
      expiresAt = issued.status?.expirationTimestamp;
    } catch (error) {
      return this.failMint({
        handle,
        code: 'token_mint_failed',
        message: `Failed to mint a token for ${principalName}: ${describeClusterError(error)}`,
        created: {principal: true, binding: true}
      });
    }

    if (!token) {
      return this.failMint({
        handle,
        code: 'token_mint_failed',
        message: `Token request for ${principalName} returned no token`,
        created: {principal: true, binding: true}
      });
    }

    const credential: ScopedCredential = {
      handle,
      token,
      expiresAt: expiresAt ?? new Date(this.now().getTime() + this.tokenTtlSeconds * 1000),
      workload,
      cluster: this.cluster
    };

    this.logger.info({
      event: 'credentials.mint.success',
      component: 'credentials.kubernetes',
      message: 'Scoped credential minted',
      workload: workload.workloadName,
      metadata: {
        namespace: handle.namespace,
        principal: principalName,
        role: handle.roleName,
        expires_at: credential.expiresAt.toISOString()
      }
    });

    return ok(credential);
  }

  async revoke(credential: ScopedCredential) {
    const {handle} = credential;

    try {
      await this.rbac.deleteNamespacedRoleBinding({name: handle.bindingName, namespace: handle.namespace});
    } catch (error) {
      this.logRevokeFailure({handle, object: 'RoleBinding', error});
    }

    try {
      await this.core.deleteNamespacedServiceAccount({name: handle.principalName, namespace: handle.namespace});
    } catch (error) {
      this.logRevokeFailure({handle, object: 'ServiceAccount', error});
    }
  }

  private async ensureRole(handle: CredentialHandle, workloadName: string) {
    try {
      await this.rbac.createNamespacedRole({
        namespace: handle.namespace,
        body: {
          metadata: {name: handle.roleName, namespace: handle.namespace, labels: MANAGED_BY_LABEL},
          rules: workloadPolicyRules(workloadName)
        }
      });
    } catch (error) {
      if (clusterStatusOf(error) !== 409) {
        throw error;
      }
    }
  }

  private async failMint({
    handle,
    code,
    message,
    created
  }: {
    handle: CredentialHandle;
    code: 'principal_create_failed' | 'binding_failed' | 'token_mint_failed';
    message: string;
    created: {principal: boolean; binding: boolean};
  }) {
    this.logger.warn({
      event: 'credentials.mint.failed',
      component: 'credentials.kubernetes',
      message,
      reason_code: code,
      metadata: {namespace: handle.namespace, principal: handle.principalName}
    });

    if (created.binding) {
      await this.rollback({handle, object: 'RoleBinding'}, () =>
        this.rbac.deleteNamespacedRoleBinding({name: handle.bindingName, namespace: handle.namespace})
      );
    }

    if (created.principal) {
      await this.rollback({handle, object: 'ServiceAccount'}, () =>
        this.core.deleteNamespacedServiceAccount({name: handle.principalName, namespace: handle.namespace})
      );
    }

    return err(code, message);
  }

  private async rollback(
    {handle, object}: {handle: CredentialHandle; object: 'RoleBinding' | 'ServiceAccount'},
    remove: () => Promise<unknown>
  ) {
    try {
      await remove();
    } catch (error) {
      if (isNotFound(error)) {
        return;
      }

      this.logger.error({
        event: 'credentials.rollback.failed',
        component: 'credentials.kubernetes',
        message: `Rollback could not delete ${object}`,
        reason_code: 'rollback_failed',
        metadata: {namespace: handle.namespace, principal: handle.principalName, error: describeClusterError(error)}
      });
    }
  }

  private logRevokeFailure({
    handle,
    object,
    error
  }: {
    handle: CredentialHandle;
    object: 'RoleBinding' | 'ServiceAccount';
    error: unknown;
  }) {
    if (isNotFound(error)) {
      return;
    }

    this.logger.warn({
      event: 'credentials.revoke.failed',
      component: 'credentials.kubernetes',
      message: `Could not delete ${object}`,
      reason_code: 'revoke_failed',
      metadata: {namespace: handle.namespace, principal: handle.principalName, error: describeClusterError(error)}
    });
  }
}

export const loadKubeConfig = (kubeconfigPath?: string) => {
  const kubeConfig = new KubeConfig();
  if (kubeconfigPath) {
    kubeConfig.loadFromFile(kubeconfigPath);
  } else {
    kubeConfig.loadFromDefault();
  }

  return kubeConfig;
};

export const clusterEndpointOf = (kubeConfig: KubeConfig): ClusterEndpoint => {
  const cluster = kubeConfig.getCurrentCluster();
  if (!cluster) {
    throw new Error('Kubeconfig has no current cluster');
  }

  return {
    server: cluster.server,
    ...(cluster.caData ? {caData: cluster.caData} : {}),
    ...(cluster.caFile ? {caFile: cluster.caFile} : {}),
    ...(cluster.skipTLSVerify ? {skipTLSVerify: true} : {})
  };
};

export const createKubernetesCredentialIssuer = ({
  kubeConfig,
  ...options
}: Omit<KubernetesCredentialIssuerOptions, 'core' | 'rbac' | 'cluster'> & {kubeConfig: KubeConfig}) =>
  new KubernetesCredentialIssuer({
    ...options,
    core: kubeConfig.makeApiClient(CoreV1Api),
    rbac: kubeConfig.makeApiClient(RbacAuthorizationV1Api),
    cluster: clusterEndpointOf(kubeConfig)
  });

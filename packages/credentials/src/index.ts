export {
  PRINCIPAL_NAME_PREFIX,
  ROLE_NAME_PREFIX,
  type ClusterCredentialIssuer,
  type ClusterEndpoint,
  type CredentialHandle,
  type ScopedCredential
} from './contracts';
export {
  clusterStatusOf,
  credentialErrorCodeSchema,
  err,
  ok,
  type CredentialError,
  type CredentialErrorCode,
  type CredentialResult
} from './errors';
export {createInMemoryCredentialIssuer, type InMemoryCredentialIssuer} from './inMemoryIssuer';
export {
  clusterEndpointOf,
  createKubernetesCredentialIssuer,
  KubernetesCredentialIssuer,
  loadKubeConfig,
  workloadPolicyRules,
  type CoreApi,
  type KubernetesCredentialIssuerOptions,
  type RbacApi
} from './kubernetesIssuer';

/**
 * Kubernetes client types
 */

export const OWNER_KINDS = {
  POD: 'Pod',
  REPLICA_SET: 'ReplicaSet',
  DEPLOYMENT: 'Deployment',
} as const;

export type OwnerKind = (typeof OWNER_KINDS)[keyof typeof OWNER_KINDS];

export interface K8sClientConfig {
  /** Kubernetes context to use (default: current context) */
  context?: string;
  /** Kubeconfig path (default: in-cluster or ~/.kube/config) */
  kubeconfig?: string;
  /** Upper bound for every API call in ms (default: 10000) */
  requestTimeoutMs?: number;
  /** Send patches with dryRun=All (default: false) */
  dryRun?: boolean;
  /** Field manager recorded on patches (default: 'kubemend') */
  fieldManager?: string;
}

export interface OwnerReference {
  kind: string;
  name: string;
  controller: boolean;
}

/**
 * Any namespaced object that can be owned. `ownerReferences` is `undefined`
 * when the field is absent and `[]` when present but empty.
 */
export interface OwnedObject {
  kind: OwnerKind;
  name: string;
  namespace: string;
  ownerReferences?: OwnerReference[];
}

export interface ContainerSnapshot {
  name: string;
  /** Raw quantity string from resources.limits.memory */
  memoryLimit?: string;
}

/**
 * Point-in-time read of a Deployment. `resourceVersion` gates the next write.
 */
export interface DeploymentSnapshot {
  name: string;
  namespace: string;
  resourceVersion: string;
  /** Desired replicas; undefined when spec.replicas is unset */
  replicas?: number;
  containers: ContainerSnapshot[];
}

export interface MemoryLimitPatch {
  container: string;
  memoryLimit: string;
  resourceVersion: string;
}

export interface ReplicaCountPatch {
  replicas: number;
  resourceVersion: string;
}

export type StoreFailureReason = 'not_found' | 'conflict' | 'forbidden' | 'transient' | 'unknown';

export interface StoreFailure {
  reason: StoreFailureReason;
  detail: string;
  statusCode?: number;
}

export type StoreResult<T> = { ok: true; value: T } | { ok: false; failure: StoreFailure };

/**
 * Narrow contract the remediation pipeline needs from the cluster.
 * Implementations report failures as values and never throw.
 */
export interface OrchestrationStore {
  /** True when writes are validated by the API server but not persisted */
  readonly dryRun: boolean;

  readPod(name: string, namespace: string): Promise<StoreResult<OwnedObject>>;

  readReplicaSet(name: string, namespace: string): Promise<StoreResult<OwnedObject>>;

  readDeployment(name: string, namespace: string): Promise<StoreResult<DeploymentSnapshot>>;

  patchDeploymentSpec(
    name: string,
    namespace: string,
    patch: MemoryLimitPatch
  ): Promise<StoreResult<DeploymentSnapshot>>;

  /** Resolves to the replica count the API server accepted */
  patchDeploymentScale(
    name: string,
    namespace: string,
    patch: ReplicaCountPatch
  ): Promise<StoreResult<number>>;
}

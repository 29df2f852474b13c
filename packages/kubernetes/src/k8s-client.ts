/**
 * Kubernetes Client
 * OrchestrationStore backed by the Kubernetes API. Every request carries a
 * socket timeout and every failure is returned as a classified StoreFailure.
 */

import * as k8s from '@kubernetes/client-node';
import {
  createChildLogger,
  InvalidResourceError,
  KubemendError,
  TransientTransportError,
} from '@kubemend/shared';
import type {
  K8sClientConfig,
  OrchestrationStore,
  OwnedObject,
  OwnerKind,
  OwnerReference,
  DeploymentSnapshot,
  MemoryLimitPatch,
  ReplicaCountPatch,
  StoreFailure,
  StoreResult,
} from './types.js';
import { OWNER_KINDS } from './types.js';

const DEFAULT_CONFIG = {
  requestTimeoutMs: 10000,
  dryRun: false,
  fieldManager: 'kubemend',
} as const;

const STRATEGIC_MERGE_PATCH = {
  headers: { 'Content-Type': 'application/strategic-merge-patch+json' },
};

const TRANSIENT_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);

/**
 * The API surface K8sClient calls. Injectable so tests can stand in for the
 * API server.
 */
export interface K8sApis {
  core: Pick<k8s.CoreV1Api, 'readNamespacedPod'>;
  apps: Pick<
    k8s.AppsV1Api,
    | 'readNamespacedReplicaSet'
    | 'readNamespacedDeployment'
    | 'patchNamespacedDeployment'
    | 'patchNamespacedDeploymentScale'
  >;
}

export class K8sClient implements OrchestrationStore {
  readonly dryRun: boolean;

  private apis: K8sApis;
  private requestTimeoutMs: number;
  private fieldManager: string;
  private logger = createChildLogger({ component: 'K8sClient' });

  constructor(config: K8sClientConfig = {}, apis?: K8sApis) {
    this.dryRun = config.dryRun ?? DEFAULT_CONFIG.dryRun;
    this.requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_CONFIG.requestTimeoutMs;
    this.fieldManager = config.fieldManager ?? DEFAULT_CONFIG.fieldManager;
    this.apis = apis ?? K8sClient.createApis(config, this.requestTimeoutMs);

    this.logger.info(
      {
        requestTimeoutMs: this.requestTimeoutMs,
        dryRun: this.dryRun,
        fieldManager: this.fieldManager,
      },
      'K8s client initialized'
    );
  }

  private static createApis(config: K8sClientConfig, requestTimeoutMs: number): K8sApis {
    const kc = new k8s.KubeConfig();

    if (config.kubeconfig) {
      kc.loadFromFile(config.kubeconfig);
    } else {
      kc.loadFromDefault();
    }

    if (config.context) {
      kc.setCurrentContext(config.context);
    }

    return {
      core: boundRequests(kc.makeApiClient(k8s.CoreV1Api), requestTimeoutMs),
      apps: boundRequests(kc.makeApiClient(k8s.AppsV1Api), requestTimeoutMs),
    };
  }

  async readPod(name: string, namespace: string): Promise<StoreResult<OwnedObject>> {
    return this.call(
      `read pod ${namespace}/${name}`,
      () => this.apis.core.readNamespacedPod(name, namespace),
      (pod) => mapOwnedObject(OWNER_KINDS.POD, pod.metadata, name, namespace)
    );
  }

  async readReplicaSet(name: string, namespace: string): Promise<StoreResult<OwnedObject>> {
    return this.call(
      `read replicaset ${namespace}/${name}`,
      () => this.apis.apps.readNamespacedReplicaSet(name, namespace),
      (rs) => mapOwnedObject(OWNER_KINDS.REPLICA_SET, rs.metadata, name, namespace)
    );
  }

  async readDeployment(name: string, namespace: string): Promise<StoreResult<DeploymentSnapshot>> {
    return this.call(
      `read deployment ${namespace}/${name}`,
      () => this.apis.apps.readNamespacedDeployment(name, namespace),
      (deployment) => mapDeploymentSnapshot(deployment, name, namespace)
    );
  }

  /**
   * Strategic-merge patch of one container's memory limit. The
   * resourceVersion precondition makes the API server answer 409 when the
   * Deployment changed since it was read.
   */
  async patchDeploymentSpec(
    name: string,
    namespace: string,
    patch: MemoryLimitPatch
  ): Promise<StoreResult<DeploymentSnapshot>> {
    const body = {
      metadata: { resourceVersion: patch.resourceVersion },
      spec: {
        template: {
          spec: {
            containers: [
              {
                name: patch.container,
                resources: { limits: { memory: patch.memoryLimit } },
              },
            ],
          },
        },
      },
    };

    this.logger.info(
      {
        deployment: name,
        namespace,
        container: patch.container,
        memoryLimit: patch.memoryLimit,
        resourceVersion: patch.resourceVersion,
        dryRun: this.dryRun,
      },
      'Patching deployment memory limit'
    );

    return this.call(
      `patch deployment ${namespace}/${name}`,
      () =>
        this.apis.apps.patchNamespacedDeployment(
          name,
          namespace,
          body,
          undefined,
          this.dryRun ? 'All' : undefined,
          this.fieldManager,
          undefined,
          undefined,
          STRATEGIC_MERGE_PATCH
        ),
      (deployment) => mapDeploymentSnapshot(deployment, name, namespace)
    );
  }

  /**
   * Patch of the scale subresource, gated on resourceVersion the same way
   */
  async patchDeploymentScale(
    name: string,
    namespace: string,
    patch: ReplicaCountPatch
  ): Promise<StoreResult<number>> {
    const body = {
      metadata: { resourceVersion: patch.resourceVersion },
      spec: { replicas: patch.replicas },
    };

    this.logger.info(
      {
        deployment: name,
        namespace,
        replicas: patch.replicas,
        resourceVersion: patch.resourceVersion,
        dryRun: this.dryRun,
      },
      'Patching deployment scale'
    );

    return this.call(
      `scale deployment ${namespace}/${name}`,
      () =>
        this.apis.apps.patchNamespacedDeploymentScale(
          name,
          namespace,
          body,
          undefined,
          this.dryRun ? 'All' : undefined,
          this.fieldManager,
          undefined,
          undefined,
          STRATEGIC_MERGE_PATCH
        ),
      (scale) => scale.spec?.replicas ?? patch.replicas
    );
  }

  private async call<B, R>(
    description: string,
    request: () => Promise<{ body: B }>,
    map: (body: B) => R
  ): Promise<StoreResult<R>> {
    try {
      // The socket timeout aborts the request; this deadline also covers injected APIs
      const response = await withTimeout(request(), this.requestTimeoutMs, description);
      return { ok: true, value: map(response.body) };
    } catch (error) {
      const failure = classifyError(error);
      this.logger.debug({ operation: description, ...failure }, 'Kubernetes call failed');
      return { ok: false, failure };
    }
  }
}

/**
 * Set the request library's `timeout` on every call the API object makes, so a
 * slow API server has its connection aborted rather than left running
 */
export function boundRequests<T extends Pick<k8s.CoreV1Api, 'addInterceptor'>>(api: T, timeoutMs: number): T {
  api.addInterceptor((options) => {
    options.timeout = timeoutMs;
  });
  return api;
}

/**
 * Reject with a TransientTransportError when `operation` outlives `timeoutMs`
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  description: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TransientTransportError(`${description} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Map a thrown API error onto the store failure taxonomy.
 * client-node raises HttpError with `statusCode` and the API Status as `body`;
 * socket-level failures carry a Node error `code` instead.
 */
export function classifyError(error: unknown): StoreFailure {
  const detail = describeError(error);

  if (error instanceof TransientTransportError) {
    return { reason: 'transient', detail };
  }

  const statusCode = readStatusCode(error);
  if (statusCode === undefined) {
    return { reason: hasSystemErrorCode(error) ? 'transient' : 'unknown', detail };
  }

  if (statusCode === 404) {
    return { reason: 'not_found', detail, statusCode };
  }
  if (statusCode === 409) {
    return { reason: 'conflict', detail, statusCode };
  }
  if (statusCode === 401 || statusCode === 403) {
    return { reason: 'forbidden', detail, statusCode };
  }
  if (TRANSIENT_STATUS_CODES.has(statusCode)) {
    return { reason: 'transient', detail, statusCode };
  }
  return { reason: 'unknown', detail, statusCode };
}

function readStatusCode(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error) {
    return typeof error.statusCode === 'number' ? error.statusCode : undefined;
  }
  return undefined;
}

function hasSystemErrorCode(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    !(error instanceof KubemendError) &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

function describeError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'body' in error) {
    const body = error.body;
    if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
      return body.message;
    }
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function mapOwnerReferences(refs: k8s.V1OwnerReference[] | undefined): OwnerReference[] | undefined {
  return refs?.map((ref) => ({
    kind: ref.kind,
    name: ref.name,
    controller: ref.controller ?? false,
  }));
}

function mapOwnedObject(
  kind: OwnerKind,
  metadata: k8s.V1ObjectMeta | undefined,
  name: string,
  namespace: string
): OwnedObject {
  return {
    kind,
    name: metadata?.name ?? name,
    namespace: metadata?.namespace ?? namespace,
    ownerReferences: mapOwnerReferences(metadata?.ownerReferences),
  };
}

function mapDeploymentSnapshot(
  deployment: k8s.V1Deployment,
  name: string,
  namespace: string
): DeploymentSnapshot {
  const resourceVersion = deployment.metadata?.resourceVersion;
  if (!resourceVersion) {
    throw new InvalidResourceError(`Deployment '${name}' has no resourceVersion`, {
      namespace,
      resourceName: name,
    });
  }

  return {
    name: deployment.metadata?.name ?? name,
    namespace: deployment.metadata?.namespace ?? namespace,
    resourceVersion,
    replicas: deployment.spec?.replicas,
    containers:
      deployment.spec?.template.spec?.containers.map((container: k8s.V1Container) => ({
        name: container.name,
        memoryLimit: container.resources?.limits?.['memory'],
      })) ?? [],
  };
}

/**
 * Mutation Applier
 * Read → decide → patch, gated on the Deployment's resourceVersion. A stale
 * write (409) or a transient failure starts the cycle again from a fresh read,
 * up to `maxAttempts` cycles. A patch that failed transiently may still have
 * been applied, so the next read checks for it before deciding again.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import {
  createChildLogger,
  ConflictRetryExhaustedError,
  KubernetesOperationError,
  ResourceNotFoundError,
  TransientTransportError,
  type KubemendError,
} from '@kubemend/shared';
import { OWNER_KINDS } from '@kubemend/kubernetes';
import type { DeploymentSnapshot, OrchestrationStore, StoreFailure, StoreResult } from '@kubemend/kubernetes';
import { decide, describeDecision } from './remediation-policy.js';
import { REMEDIATION_ACTIONS } from './types.js';
import type {
  MutationApplierConfig,
  RemediationAction,
  RemediationDecision,
  RemediationOutcome,
} from './types.js';

const logger = createChildLogger({ component: 'MutationApplier' });

const DEFAULT_CONFIG: MutationApplierConfig = {
  maxAttempts: 3,
  retryDelayMs: 200,
};

interface AttemptState {
  attempts: number;
  lastDecision?: RemediationDecision;
  lastFailure?: StoreFailure;
  /** Patch whose transient failure leaves it unknown whether it was applied */
  unconfirmedWrite?: { resourceVersion: string; decision: RemediationDecision };
}

export class MutationApplier {
  private config: MutationApplierConfig;

  constructor(
    private readonly store: OrchestrationStore,
    config: Partial<MutationApplierConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async apply(resourceName: string, namespace: string, action: RemediationAction): Promise<RemediationOutcome> {
    const state: AttemptState = { attempts: 0 };

    while (state.attempts < this.config.maxAttempts) {
      if (state.attempts > 0 && this.config.retryDelayMs > 0) {
        await sleep(this.config.retryDelayMs);
      }
      state.attempts += 1;

      const snapshot = await this.store.readDeployment(resourceName, namespace);
      if (!snapshot.ok) {
        if (isRetryable(snapshot.failure)) {
          this.noteRetry(state, snapshot.failure, resourceName, namespace, 'read');
          continue;
        }
        return this.failure(state, resourceName, namespace, action, toError(snapshot.failure, resourceName, namespace));
      }

      const landed = state.unconfirmedWrite;
      state.unconfirmedWrite = undefined;
      if (landed && wasApplied(snapshot.value, landed.resourceVersion, landed.decision)) {
        logger.info(
          {
            namespace,
            deployment: resourceName,
            attempt: state.attempts,
            resourceVersion: snapshot.value.resourceVersion,
          },
          'Patch reported as failed was applied, not patching again'
        );
        return this.success(state, resourceName, namespace, action, landed.decision);
      }

      const policy = decide(action, snapshot.value);
      if (!policy.ok) {
        return this.failure(state, resourceName, namespace, action, policy.error);
      }
      state.lastDecision = policy.decision;

      const written = await this.patch(snapshot.value, policy.decision);
      if (written.ok) {
        return this.success(state, resourceName, namespace, action, policy.decision);
      }

      if (!isRetryable(written.failure)) {
        return this.failure(state, resourceName, namespace, action, toError(written.failure, resourceName, namespace));
      }
      if (written.failure.reason === 'transient') {
        state.unconfirmedWrite = { resourceVersion: snapshot.value.resourceVersion, decision: policy.decision };
      }
      this.noteRetry(state, written.failure, resourceName, namespace, 'patch');
    }

    return this.failure(state, resourceName, namespace, action, this.exhaustedError(state, resourceName, namespace));
  }

  private patch(snapshot: DeploymentSnapshot, decision: RemediationDecision): Promise<StoreResult<unknown>> {
    if (decision.action === REMEDIATION_ACTIONS.INCREMENT_MEMORY) {
      return this.store.patchDeploymentSpec(snapshot.name, snapshot.namespace, {
        container: decision.container,
        memoryLimit: decision.newMemoryLimit,
        resourceVersion: snapshot.resourceVersion,
      });
    }
    return this.store.patchDeploymentScale(snapshot.name, snapshot.namespace, {
      replicas: decision.newReplicaCount,
      resourceVersion: snapshot.resourceVersion,
    });
  }

  private noteRetry(
    state: AttemptState,
    failure: StoreFailure,
    resourceName: string,
    namespace: string,
    stage: 'read' | 'patch'
  ): void {
    state.lastFailure = failure;
    logger.warn(
      {
        namespace,
        deployment: resourceName,
        stage,
        attempt: state.attempts,
        maxAttempts: this.config.maxAttempts,
        reason: failure.reason,
        detail: failure.detail,
      },
      `Retryable ${failure.reason} during ${stage}, re-reading deployment`
    );
  }

  private exhaustedError(state: AttemptState, resourceName: string, namespace: string): KubemendError {
    const detail = state.lastFailure?.detail ?? 'no attempt completed';
    if (state.lastFailure?.reason === 'conflict') {
      return new ConflictRetryExhaustedError(resourceName, namespace, state.attempts, detail);
    }
    return new TransientTransportError(
      `Kubernetes API unavailable for '${resourceName}' in namespace '${namespace}' after ${state.attempts} attempts: ${detail}`,
      { namespace, resourceName, retryable: false }
    );
  }

  private success(
    state: AttemptState,
    resourceName: string,
    namespace: string,
    action: RemediationAction,
    decision: RemediationDecision
  ): RemediationOutcome {
    const { previousValue, newValue } = describeDecision(decision);
    return {
      status: 'success',
      action,
      resourceName,
      namespace,
      previousValue,
      newValue,
      attempts: state.attempts,
      dryRun: this.store.dryRun,
    };
  }

  private failure(
    state: AttemptState,
    resourceName: string,
    namespace: string,
    action: RemediationAction,
    error: KubemendError
  ): RemediationOutcome {
    const values = state.lastDecision ? describeDecision(state.lastDecision) : {};
    return {
      status: 'failure',
      action,
      resourceName,
      namespace,
      ...values,
      attempts: state.attempts,
      dryRun: this.store.dryRun,
      error,
    };
  }
}

/**
 * True when the Deployment moved past the resourceVersion the patch was gated
 * on and already carries the value the patch would have written
 */
function wasApplied(snapshot: DeploymentSnapshot, patchedVersion: string, decision: RemediationDecision): boolean {
  if (snapshot.resourceVersion === patchedVersion) {
    return false;
  }
  if (decision.action === REMEDIATION_ACTIONS.INCREMENT_MEMORY) {
    const container = snapshot.containers.find((candidate) => candidate.name === decision.container);
    return container?.memoryLimit === decision.newMemoryLimit;
  }
  return snapshot.replicas === decision.newReplicaCount;
}

function isRetryable(failure: StoreFailure): boolean {
  return failure.reason === 'conflict' || failure.reason === 'transient';
}

function toError(failure: StoreFailure, resourceName: string, namespace: string): KubemendError {
  if (failure.reason === 'not_found') {
    return new ResourceNotFoundError(OWNER_KINDS.DEPLOYMENT, resourceName, namespace, {
      detail: failure.detail,
    });
  }
  return new KubernetesOperationError(
    `Kubernetes rejected the request for '${resourceName}' in namespace '${namespace}' (${failure.reason}): ${failure.detail}`,
    { namespace, resourceName, statusCode: failure.statusCode }
  );
}

/**
 * Remediation Policy
 * Pure decision rules: given the state just read from the cluster, compute the
 * next memory limit or replica count. No ceiling is applied here.
 */

import { InvalidResourceError } from '@kubemend/shared';
import type { DeploymentSnapshot } from '@kubemend/kubernetes';
import { FALLBACK_MEMORY_MIB, formatMiB, parseMemoryToMiB } from './memory-quantity.js';
import { REMEDIATION_ACTIONS } from './types.js';
import type { MemoryDecision, RemediationAction, RemediationDecision, ReplicaDecision } from './types.js';

/** Limit assumed for a container that declares none */
export const DEFAULT_MEMORY_LIMIT_MIB = FALLBACK_MEMORY_MIB;
export const MEMORY_INCREASE_FACTOR = 1.25;
/** Replicas assumed when spec.replicas is unset */
export const DEFAULT_REPLICA_COUNT = 1;
/** Unreplicated workloads jump straight to this many replicas */
export const HIGH_AVAILABILITY_REPLICAS = 2;

export interface MemoryIncrement {
  previousMiB: number;
  newMiB: number;
  previousMemoryLimit: string;
  newMemoryLimit: string;
}

/**
 * +25%, floored to whole MiB. Small limits where the floor would not move
 * still grow by 1 MiB, so repeated calls always increase the limit.
 */
export function incrementMemory(currentLimit?: string): MemoryIncrement {
  const previousMiB = currentLimit === undefined ? DEFAULT_MEMORY_LIMIT_MIB : parseMemoryToMiB(currentLimit);
  const newMiB = Math.max(Math.floor(previousMiB * MEMORY_INCREASE_FACTOR), previousMiB + 1);

  return {
    previousMiB,
    newMiB,
    previousMemoryLimit: currentLimit ?? formatMiB(DEFAULT_MEMORY_LIMIT_MIB),
    newMemoryLimit: formatMiB(newMiB),
  };
}

/**
 * 0 or 1 replicas go to 2; anything at or above 2 grows by one.
 */
export function scaleOut(currentReplicas?: number): number {
  const current = currentReplicas ?? DEFAULT_REPLICA_COUNT;
  return current >= HIGH_AVAILABILITY_REPLICAS ? current + 1 : HIGH_AVAILABILITY_REPLICAS;
}

export type PolicyResult = { ok: true; decision: RemediationDecision } | { ok: false; error: InvalidResourceError };

/**
 * Choose the decision procedure for `action` and apply it to `snapshot`.
 * Memory remediation always targets the first container.
 */
export function decide(action: RemediationAction, snapshot: DeploymentSnapshot): PolicyResult {
  switch (action) {
    case REMEDIATION_ACTIONS.INCREMENT_MEMORY: {
      const [container] = snapshot.containers;
      if (!container) {
        return {
          ok: false,
          error: new InvalidResourceError(`Deployment '${snapshot.name}' has no containers`, {
            namespace: snapshot.namespace,
            resourceName: snapshot.name,
          }),
        };
      }

      const increment = incrementMemory(container.memoryLimit);
      // Past 2^53 the MiB count renders in exponent form, which is not a quantity
      if (!Number.isSafeInteger(increment.newMiB)) {
        return {
          ok: false,
          error: new InvalidResourceError(
            `Memory limit '${increment.previousMemoryLimit}' of container '${container.name}' is too large to increase`,
            { namespace: snapshot.namespace, resourceName: snapshot.name }
          ),
        };
      }
      const decision: MemoryDecision = {
        action,
        container: container.name,
        previousMemoryLimit: increment.previousMemoryLimit,
        newMemoryLimit: increment.newMemoryLimit,
      };
      return { ok: true, decision };
    }

    case REMEDIATION_ACTIONS.SCALE_OUT: {
      const previousReplicaCount = snapshot.replicas ?? DEFAULT_REPLICA_COUNT;
      const decision: ReplicaDecision = {
        action,
        previousReplicaCount,
        newReplicaCount: scaleOut(previousReplicaCount),
      };
      return { ok: true, decision };
    }
  }
}

/** Previous and new values of a decision, rendered for messages and audit */
export function describeDecision(decision: RemediationDecision): { previousValue: string; newValue: string } {
  if (decision.action === REMEDIATION_ACTIONS.INCREMENT_MEMORY) {
    return { previousValue: decision.previousMemoryLimit, newValue: decision.newMemoryLimit };
  }
  return {
    previousValue: String(decision.previousReplicaCount),
    newValue: String(decision.newReplicaCount),
  };
}

/**
 * Remediation Types
 * Requests, decisions and outcomes of a single remediation
 */

import type { KubemendError } from '@kubemend/shared';
import type { OwnerKind } from '@kubemend/kubernetes';

/**
 * Supported remediation actions (wire values)
 */
export const REMEDIATION_ACTIONS = {
  INCREMENT_MEMORY: 'increment_memory',
  SCALE_OUT: 'scale',
} as const;

export type RemediationAction = (typeof REMEDIATION_ACTIONS)[keyof typeof REMEDIATION_ACTIONS];

export const REMEDIATION_ACTION_VALUES = [
  REMEDIATION_ACTIONS.INCREMENT_MEMORY,
  REMEDIATION_ACTIONS.SCALE_OUT,
] as const;

/**
 * What the caller asks for. Carries intent only; target values are always
 * computed from the live resource.
 */
export interface RemediationRequest {
  action: RemediationAction;
  /** Pod or Deployment name */
  target: string;
  namespace: string;
}

export interface OwnershipLink {
  kind: OwnerKind;
  name: string;
}

export type ResolutionFallback =
  /** The target could not be read as a Pod; most often it already names a Deployment */
  | 'target_not_a_pod'
  /** The Pod has no owner references, absent or empty */
  | 'no_owners'
  /** Owners exist but no ReplicaSet → Deployment chain was found */
  | 'chain_incomplete'
  /** A read failed for a reason other than not-found */
  | 'unreadable';

export interface OwnershipResolution {
  /** Canonical resource name to remediate */
  name: string;
  /** True when a Deployment was found through the ownership chain */
  resolved: boolean;
  /** Links walked, starting at the target */
  chain: OwnershipLink[];
  fallback?: ResolutionFallback;
}

export interface MemoryDecision {
  action: typeof REMEDIATION_ACTIONS.INCREMENT_MEMORY;
  container: string;
  previousMemoryLimit: string;
  newMemoryLimit: string;
}

export interface ReplicaDecision {
  action: typeof REMEDIATION_ACTIONS.SCALE_OUT;
  previousReplicaCount: number;
  newReplicaCount: number;
}

export type RemediationDecision = MemoryDecision | ReplicaDecision;

interface OutcomeBase {
  action: RemediationAction;
  resourceName: string;
  namespace: string;
  /** Read/patch cycles performed */
  attempts: number;
  dryRun: boolean;
}

export interface RemediationSuccess extends OutcomeBase {
  status: 'success';
  previousValue: string;
  newValue: string;
}

export interface RemediationFailure extends OutcomeBase {
  status: 'failure';
  /** Values of the last decision, when one was computed */
  previousValue?: string;
  newValue?: string;
  error: KubemendError;
}

export type RemediationOutcome = RemediationSuccess | RemediationFailure;

export interface MutationApplierConfig {
  /** Upper bound on read → decide → patch cycles */
  maxAttempts: number;
  /** Pause between cycles in ms */
  retryDelayMs: number;
}

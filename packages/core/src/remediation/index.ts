/**
 * Remediation Module
 * Ownership resolution, decision policy and conflict-safe mutation
 */

// Types
export type {
  RemediationAction,
  RemediationRequest,
  RemediationDecision,
  MemoryDecision,
  ReplicaDecision,
  RemediationOutcome,
  RemediationSuccess,
  RemediationFailure,
  OwnershipLink,
  OwnershipResolution,
  ResolutionFallback,
  MutationApplierConfig,
} from './types.js';

export { REMEDIATION_ACTIONS, REMEDIATION_ACTION_VALUES } from './types.js';

// Pure helpers
export { parseMemoryToMiB, formatMiB, FALLBACK_MEMORY_MIB } from './memory-quantity.js';
export {
  incrementMemory,
  scaleOut,
  decide,
  describeDecision,
  DEFAULT_MEMORY_LIMIT_MIB,
  MEMORY_INCREASE_FACTOR,
  DEFAULT_REPLICA_COUNT,
  HIGH_AVAILABILITY_REPLICAS,
  type MemoryIncrement,
  type PolicyResult,
} from './remediation-policy.js';

// Pipeline
export { OwnershipResolver } from './ownership-resolver.js';
export { MutationApplier } from './mutation-applier.js';
export { RemediationEngine, formatOutcomeMessage, type RemediationEngineConfig } from './remediation-engine.js';

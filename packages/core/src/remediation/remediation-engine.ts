/**
 * Remediation Engine
 * Resolves the target to its Deployment, then hands it to the applier.
 * Holds no per-request state, so one instance serves concurrent requests.
 */

import { createChildLogger, logRemediationOutcome } from '@kubemend/shared';
import type { OrchestrationStore } from '@kubemend/kubernetes';
import { MutationApplier } from './mutation-applier.js';
import { OwnershipResolver } from './ownership-resolver.js';
import { REMEDIATION_ACTIONS } from './types.js';
import type { MutationApplierConfig, RemediationOutcome, RemediationRequest } from './types.js';

const logger = createChildLogger({ component: 'RemediationEngine' });

export type RemediationEngineConfig = Partial<MutationApplierConfig>;

export class RemediationEngine {
  private resolver: OwnershipResolver;
  private applier: MutationApplier;

  constructor(store: OrchestrationStore, config: RemediationEngineConfig = {}) {
    this.resolver = new OwnershipResolver(store);
    this.applier = new MutationApplier(store, config);
  }

  async remediate(request: RemediationRequest): Promise<RemediationOutcome> {
    const startTime = Date.now();
    const resolution = await this.resolver.resolve(request.target, request.namespace);

    logger.info(
      {
        action: request.action,
        namespace: request.namespace,
        target: request.target,
        deployment: resolution.name,
        resolved: resolution.resolved,
        fallback: resolution.fallback,
      },
      `Remediating ${request.namespace}/${resolution.name}`
    );

    const outcome = await this.applier.apply(resolution.name, request.namespace, request.action);

    logRemediationOutcome({
      status: outcome.status,
      action: outcome.action,
      resourceName: outcome.resourceName,
      namespace: outcome.namespace,
      previousValue: outcome.previousValue,
      newValue: outcome.newValue,
      attempts: outcome.attempts,
      dryRun: outcome.dryRun,
      errorCode: outcome.status === 'failure' ? outcome.error.code : undefined,
      errorDetail: outcome.status === 'failure' ? outcome.error.message : undefined,
    });
    logger.debug({ durationMs: Date.now() - startTime }, 'Remediation finished');

    return outcome;
  }
}

/**
 * Human-readable summary returned to the caller
 */
export function formatOutcomeMessage(outcome: RemediationOutcome): string {
  if (outcome.status === 'failure') {
    const verb = outcome.action === REMEDIATION_ACTIONS.INCREMENT_MEMORY ? 'increment memory of' : 'scale';
    return `Failed to ${verb} ${outcome.resourceName} in ${outcome.namespace}: ${outcome.error.message}`;
  }

  const prefix = outcome.dryRun ? '[DRY RUN] ' : '';
  if (outcome.action === REMEDIATION_ACTIONS.INCREMENT_MEMORY) {
    return `${prefix}Vertical scaling: ${outcome.resourceName} memory limit ${outcome.previousValue} → ${outcome.newValue}`;
  }
  return `${prefix}Horizontal scaling: ${outcome.resourceName} replicas ${outcome.previousValue} → ${outcome.newValue}`;
}

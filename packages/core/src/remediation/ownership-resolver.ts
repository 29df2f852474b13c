/**
 * Ownership Resolver
 * Walks Pod → ReplicaSet → Deployment to find the resource a remediation
 * should mutate. Only that two-hop topology is modeled; anything else (bare
 * Pods, StatefulSets, ReplicaSets without a Deployment) resolves to the
 * caller-supplied name.
 */

import { createChildLogger } from '@kubemend/shared';
import { OWNER_KINDS } from '@kubemend/kubernetes';
import type { OrchestrationStore, OwnerReference, StoreFailure } from '@kubemend/kubernetes';
import type { OwnershipLink, OwnershipResolution, ResolutionFallback } from './types.js';

const logger = createChildLogger({ component: 'OwnershipResolver' });

export class OwnershipResolver {
  constructor(private readonly store: OrchestrationStore) {}

  /**
   * Never fails: any read error or missing link falls back to `name`.
   */
  async resolve(name: string, namespace: string): Promise<OwnershipResolution> {
    const chain: OwnershipLink[] = [{ kind: OWNER_KINDS.POD, name }];

    const pod = await this.store.readPod(name, namespace);
    if (!pod.ok) {
      return this.fallback(
        name,
        namespace,
        chain,
        pod.failure.reason === 'not_found' ? 'target_not_a_pod' : 'unreadable',
        pod.failure
      );
    }

    const replicaSetOwners = ownersOfKind(pod.value.ownerReferences, OWNER_KINDS.REPLICA_SET);
    if (replicaSetOwners === undefined) {
      return this.fallback(name, namespace, chain, 'no_owners');
    }

    for (const owner of replicaSetOwners) {
      const replicaSet = await this.store.readReplicaSet(owner.name, namespace);
      if (!replicaSet.ok) {
        return this.fallback(
          name,
          namespace,
          [...chain, { kind: OWNER_KINDS.REPLICA_SET, name: owner.name }],
          'unreadable',
          replicaSet.failure
        );
      }

      const [deployment] = ownersOfKind(replicaSet.value.ownerReferences, OWNER_KINDS.DEPLOYMENT) ?? [];
      if (deployment) {
        const resolvedChain: OwnershipLink[] = [
          ...chain,
          { kind: OWNER_KINDS.REPLICA_SET, name: owner.name },
          { kind: OWNER_KINDS.DEPLOYMENT, name: deployment.name },
        ];

        logger.debug(
          { namespace, target: name, chain: resolvedChain },
          `Resolved ${name} to deployment ${deployment.name}`
        );

        return { name: deployment.name, resolved: true, chain: resolvedChain };
      }
    }

    return this.fallback(name, namespace, chain, 'chain_incomplete');
  }

  private fallback(
    name: string,
    namespace: string,
    chain: OwnershipLink[],
    reason: ResolutionFallback,
    failure?: StoreFailure
  ): OwnershipResolution {
    // Unreadable chains may hide RBAC or connectivity problems; keep them visible
    if (reason === 'unreadable') {
      logger.warn(
        { namespace, target: name, reason, failure },
        'Ownership chain unreadable, remediating target as named'
      );
    } else {
      logger.debug({ namespace, target: name, reason }, 'Ownership chain absent, remediating target as named');
    }

    return { name, resolved: false, chain, fallback: reason };
  }
}

/**
 * `undefined` when the object has no owners at all (field absent or empty).
 * The managing controller, when one is marked, is walked first.
 */
function ownersOfKind(refs: OwnerReference[] | undefined, kind: string): OwnerReference[] | undefined {
  if (refs === undefined || refs.length === 0) {
    return undefined;
  }
  const matching = refs.filter((ref) => ref.kind === kind);
  return [...matching.filter((ref) => ref.controller), ...matching.filter((ref) => !ref.controller)];
}

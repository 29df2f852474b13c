/**
 * Service initialization
 * One K8sClient and one stateless RemediationEngine per process, injected into
 * routes through the Fastify instance.
 */

import type { Config } from '@kubemend/shared';
import { createChildLogger } from '@kubemend/shared';
import { K8sClient, type OrchestrationStore } from '@kubemend/kubernetes';
import { RemediationEngine } from '@kubemend/core';

const logger = createChildLogger({ component: 'Services' });

export interface AppServices {
  store: OrchestrationStore;
  remediationEngine: RemediationEngine;
}

declare module 'fastify' {
  interface FastifyInstance {
    services: AppServices;
  }
}

export function initializeServices(config: Config): AppServices {
  const store = new K8sClient({
    kubeconfig: config.kubernetes.kubeconfig,
    context: config.kubernetes.context,
    requestTimeoutMs: config.kubernetes.requestTimeoutMs,
    dryRun: config.kubernetes.dryRun,
    fieldManager: config.kubernetes.fieldManager,
  });

  const remediationEngine = new RemediationEngine(store, {
    maxAttempts: config.remediation.maxAttempts,
    retryDelayMs: config.remediation.retryDelayMs,
  });

  logger.info(
    {
      dryRun: store.dryRun,
      maxAttempts: config.remediation.maxAttempts,
      allowedNamespaces: config.kubernetes.allowedNamespaces,
    },
    store.dryRun
      ? 'Remediation engine ready (DRY RUN - set K8S_DRY_RUN=false to apply patches)'
      : 'Remediation engine ready'
  );

  return { store, remediationEngine };
}

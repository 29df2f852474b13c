/**
 * Remediation Engine Tests
 * End-to-end through resolution, policy and mutation against an in-memory cluster
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { ResourceNotFoundError } from '@kubemend/shared';
import { RemediationEngine, formatOutcomeMessage } from './remediation-engine.js';
import { REMEDIATION_ACTIONS } from './types.js';
import type { RemediationOutcome } from './types.js';
import { InMemoryOrchestrationStore, owner } from './__tests__/in-memory-store.js';

describe('RemediationEngine', () => {
  let store: InMemoryOrchestrationStore;
  let engine: RemediationEngine;

  beforeEach(() => {
    store = new InMemoryOrchestrationStore();
    engine = new RemediationEngine(store, { retryDelayMs: 0 });
  });

  it('should raise the memory limit of the deployment that owns an alerting pod', async () => {
    store
      .addPod('prod', 'api-7f9-abc12', [owner('ReplicaSet', 'api-7f9')])
      .addReplicaSet('prod', 'api-7f9', [owner('Deployment', 'api')])
      .addDeployment('prod', 'api', { containers: [{ name: 'api' }] });

    const outcome = await engine.remediate({
      action: REMEDIATION_ACTIONS.INCREMENT_MEMORY,
      target: 'api-7f9-abc12',
      namespace: 'prod',
    });

    expect(outcome).toMatchObject({
      status: 'success',
      resourceName: 'api',
      previousValue: '256Mi',
      newValue: '320Mi',
    });
    expect(formatOutcomeMessage(outcome)).toBe('Vertical scaling: api memory limit 256Mi → 320Mi');
    expect(store.getDeployment('prod', 'api')?.containers).toEqual([{ name: 'api', memoryLimit: '320Mi' }]);
    expect(store.calls.filter((call) => call.operation.startsWith('patch'))).toEqual([
      { operation: 'patchDeploymentSpec', name: 'api', namespace: 'prod' },
    ]);
  });

  it('should scale a deployment named directly', async () => {
    store.addDeployment('default', 'web', { replicas: 1 });

    const outcome = await engine.remediate({
      action: REMEDIATION_ACTIONS.SCALE_OUT,
      target: 'web',
      namespace: 'default',
    });

    expect(formatOutcomeMessage(outcome)).toBe('Horizontal scaling: web replicas 1 → 2');
    expect(store.getDeployment('default', 'web')?.replicas).toBe(2);
  });

  it('should attempt the literal target when the chain is broken', async () => {
    store
      .addPod('prod', 'batch-5d8-xyz', [owner('ReplicaSet', 'batch-5d8')])
      .addReplicaSet('prod', 'batch-5d8', [owner('CustomController', 'batch')]);

    const outcome = await engine.remediate({
      action: REMEDIATION_ACTIONS.SCALE_OUT,
      target: 'batch-5d8-xyz',
      namespace: 'prod',
    });

    expect(outcome.status).toBe('failure');
    expect(outcome.resourceName).toBe('batch-5d8-xyz');
    if (outcome.status === 'failure') {
      expect(outcome.error).toBeInstanceOf(ResourceNotFoundError);
    }
  });

  it('should grow the limit again on the next request', async () => {
    store.addDeployment('prod', 'api', { containers: [{ name: 'api', memoryLimit: '320Mi' }] });
    const request = { action: REMEDIATION_ACTIONS.INCREMENT_MEMORY, target: 'api', namespace: 'prod' };

    const first = await engine.remediate(request);
    const second = await engine.remediate(request);

    expect(first.newValue).toBe('400Mi');
    expect(second.previousValue).toBe('400Mi');
    expect(second.newValue).toBe('500Mi');
  });

  it('should let concurrent requests for one deployment both land', async () => {
    store.addDeployment('default', 'web', { replicas: 2 });
    const request = { action: REMEDIATION_ACTIONS.SCALE_OUT, target: 'web', namespace: 'default' };

    const outcomes = await Promise.all([engine.remediate(request), engine.remediate(request)]);

    expect(outcomes.every((outcome) => outcome.status === 'success')).toBe(true);
    expect(outcomes.map((outcome) => outcome.newValue).sort()).toEqual(['3', '4']);
    expect(store.getDeployment('default', 'web')?.replicas).toBe(4);
  });
});

describe('formatOutcomeMessage', () => {
  const base = { resourceName: 'web', namespace: 'default', attempts: 1 };

  it('should prefix dry-run successes', () => {
    const outcome: RemediationOutcome = {
      ...base,
      status: 'success',
      action: REMEDIATION_ACTIONS.SCALE_OUT,
      previousValue: '2',
      newValue: '3',
      dryRun: true,
    };

    expect(formatOutcomeMessage(outcome)).toBe('[DRY RUN] Horizontal scaling: web replicas 2 → 3');
  });

  it('should name the resource, namespace and cause on failure', () => {
    const outcome: RemediationOutcome = {
      ...base,
      status: 'failure',
      action: REMEDIATION_ACTIONS.INCREMENT_MEMORY,
      dryRun: false,
      error: new ResourceNotFoundError('Deployment', 'web', 'default'),
    };

    expect(formatOutcomeMessage(outcome)).toBe(
      "Failed to increment memory of web in default: Deployment 'web' not found in namespace 'default'"
    );
  });
});

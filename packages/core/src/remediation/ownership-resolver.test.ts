/**
 * Ownership Resolver Tests
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { OwnershipResolver } from './ownership-resolver.js';
import { InMemoryOrchestrationStore, owner } from './__tests__/in-memory-store.js';

describe('OwnershipResolver', () => {
  let store: InMemoryOrchestrationStore;
  let resolver: OwnershipResolver;

  beforeEach(() => {
    store = new InMemoryOrchestrationStore();
    resolver = new OwnershipResolver(store);
  });

  it('should resolve pod → replicaset → deployment', async () => {
    store
      .addPod('prod', 'api-7f9-abc12', [owner('ReplicaSet', 'api-7f9')])
      .addReplicaSet('prod', 'api-7f9', [owner('Deployment', 'api')]);

    const result = await resolver.resolve('api-7f9-abc12', 'prod');

    expect(result).toEqual({
      name: 'api',
      resolved: true,
      chain: [
        { kind: 'Pod', name: 'api-7f9-abc12' },
        { kind: 'ReplicaSet', name: 'api-7f9' },
        { kind: 'Deployment', name: 'api' },
      ],
    });
  });

  it('should return the pod name when owner references are absent', async () => {
    store.addPod('prod', 'standalone', undefined);

    const result = await resolver.resolve('standalone', 'prod');

    expect(result.name).toBe('standalone');
    expect(result.resolved).toBe(false);
    expect(result.fallback).toBe('no_owners');
    expect(store.callsTo('readReplicaSet')).toBe(0);
  });

  it('should treat an empty owner list like an absent one', async () => {
    store.addPod('prod', 'standalone', []);

    const result = await resolver.resolve('standalone', 'prod');

    expect(result.name).toBe('standalone');
    expect(result.fallback).toBe('no_owners');
  });

  it('should return the pod name, not the replicaset name, when the chain is broken', async () => {
    store
      .addPod('prod', 'batch-5d8-xyz', [owner('ReplicaSet', 'batch-5d8')])
      .addReplicaSet('prod', 'batch-5d8', [owner('CustomController', 'batch')]);

    const result = await resolver.resolve('batch-5d8-xyz', 'prod');

    expect(result.name).toBe('batch-5d8-xyz');
    expect(result.resolved).toBe(false);
    expect(result.fallback).toBe('chain_incomplete');
  });

  it('should return the pod name when the replicaset has no owners', async () => {
    store.addPod('prod', 'orphan-1', [owner('ReplicaSet', 'orphan')]).addReplicaSet('prod', 'orphan', []);

    const result = await resolver.resolve('orphan-1', 'prod');

    expect(result.name).toBe('orphan-1');
    expect(result.fallback).toBe('chain_incomplete');
  });

  it('should ignore owners that are not replicasets', async () => {
    store.addPod('prod', 'db-0', [owner('StatefulSet', 'db')]);

    const result = await resolver.resolve('db-0', 'prod');

    expect(result.name).toBe('db-0');
    expect(result.fallback).toBe('chain_incomplete');
    expect(store.callsTo('readReplicaSet')).toBe(0);
  });

  it('should follow the controller reference ahead of other owners', async () => {
    store
      .addPod('prod', 'api-7f9-abc12', [
        { kind: 'ReplicaSet', name: 'adopted-rs', controller: false },
        owner('ReplicaSet', 'api-7f9'),
      ])
      .addReplicaSet('prod', 'adopted-rs', [{ kind: 'Deployment', name: 'legacy', controller: false }])
      .addReplicaSet('prod', 'api-7f9', [
        { kind: 'Deployment', name: 'shadow', controller: false },
        owner('Deployment', 'api'),
      ]);

    const result = await resolver.resolve('api-7f9-abc12', 'prod');

    expect(result.name).toBe('api');
    expect(result.chain).toEqual([
      { kind: 'Pod', name: 'api-7f9-abc12' },
      { kind: 'ReplicaSet', name: 'api-7f9' },
      { kind: 'Deployment', name: 'api' },
    ]);
    expect(store.callsTo('readReplicaSet')).toBe(1);
  });

  it('should still walk owners that are not marked as controller', async () => {
    store
      .addPod('prod', 'api-7f9-abc12', [{ kind: 'ReplicaSet', name: 'api-7f9', controller: false }])
      .addReplicaSet('prod', 'api-7f9', [{ kind: 'Deployment', name: 'api', controller: false }]);

    const result = await resolver.resolve('api-7f9-abc12', 'prod');

    expect(result.name).toBe('api');
    expect(result.resolved).toBe(true);
  });

  it('should pass a deployment name through when no pod has that name', async () => {
    store.addDeployment('default', 'web');

    const result = await resolver.resolve('web', 'default');

    expect(result).toEqual({
      name: 'web',
      resolved: false,
      chain: [{ kind: 'Pod', name: 'web' }],
      fallback: 'target_not_a_pod',
    });
  });

  it('should fall back when the pod read is forbidden', async () => {
    store
      .addPod('prod', 'api-7f9-abc12', [owner('ReplicaSet', 'api-7f9')])
      .failNext('readPod', { reason: 'forbidden', statusCode: 403, detail: 'pods is forbidden' });

    const result = await resolver.resolve('api-7f9-abc12', 'prod');

    expect(result.name).toBe('api-7f9-abc12');
    expect(result.fallback).toBe('unreadable');
  });

  it('should fall back when the replicaset read fails', async () => {
    store
      .addPod('prod', 'api-7f9-abc12', [owner('ReplicaSet', 'api-7f9')])
      .addReplicaSet('prod', 'api-7f9', [owner('Deployment', 'api')])
      .failNext('readReplicaSet', { reason: 'transient', detail: 'read replicaset prod/api-7f9 timed out after 10000ms' });

    const result = await resolver.resolve('api-7f9-abc12', 'prod');

    expect(result.name).toBe('api-7f9-abc12');
    expect(result.fallback).toBe('unreadable');
    expect(result.chain).toEqual([
      { kind: 'Pod', name: 'api-7f9-abc12' },
      { kind: 'ReplicaSet', name: 'api-7f9' },
    ]);
  });

  it('should perform at most two reads and no writes', async () => {
    store
      .addPod('prod', 'api-7f9-abc12', [owner('ReplicaSet', 'api-7f9')])
      .addReplicaSet('prod', 'api-7f9', [owner('Deployment', 'api')]);

    await resolver.resolve('api-7f9-abc12', 'prod');

    expect(store.calls.map((call) => call.operation)).toEqual(['readPod', 'readReplicaSet']);
  });

  it('should resolve again on every call', async () => {
    store
      .addPod('prod', 'api-7f9-abc12', [owner('ReplicaSet', 'api-7f9')])
      .addReplicaSet('prod', 'api-7f9', [owner('Deployment', 'api')]);

    await resolver.resolve('api-7f9-abc12', 'prod');
    await resolver.resolve('api-7f9-abc12', 'prod');

    expect(store.callsTo('readPod')).toBe(2);
  });
});

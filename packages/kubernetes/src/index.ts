/**
 * @kubemend/kubernetes
 * Orchestration store contract and its Kubernetes API implementation
 */

export { K8sClient, boundRequests, classifyError, withTimeout, type K8sApis } from './k8s-client.js';
export * from './types.js';

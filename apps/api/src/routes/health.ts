/**
 * Health check routes
 */
import type { FastifyInstance } from 'fastify';
import { existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

// Check if running inside Kubernetes cluster
const isInCluster = (): boolean => {
  return existsSync('/var/run/secrets/kubernetes.io/serviceaccount/token');
};

export async function healthRoutes(app: FastifyInstance): Promise<void> {
  // Basic health check
  app.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
  });

  // Where cluster credentials come from; no API call is made
  app.get('/health/kubernetes', async () => {
    const inCluster = isInCluster();
    const kubeconfigPath = process.env.KUBECONFIG || join(homedir(), '.kube', 'config');
    const hasKubeconfig = existsSync(kubeconfigPath);

    return {
      status: inCluster || hasKubeconfig ? 'configured' : 'unconfigured',
      inCluster,
      dryRun: app.services.store.dryRun,
      message: inCluster
        ? 'Running in Kubernetes cluster'
        : hasKubeconfig
          ? 'Kubernetes cluster configured via kubeconfig'
          : 'Kubernetes not configured',
    };
  });
}

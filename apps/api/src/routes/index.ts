/**
 * API Routes
 */

import type { FastifyInstance } from 'fastify';
import type { Config } from '@kubemend/shared';
import { healthRoutes } from './health.js';
import { manageRoutes } from './manage.js';

export async function registerRoutes(app: FastifyInstance, config: Config): Promise<void> {
  // API version prefix
  app.register(
    async (api) => {
      // Health check routes
      api.register(healthRoutes);

      // Remediation requests from alerting
      api.register(manageRoutes, {
        apiToken: config.auth.apiToken,
        defaultNamespace: config.kubernetes.defaultNamespace,
        allowedNamespaces: config.kubernetes.allowedNamespaces,
      });
    },
    { prefix: '/api/v1' }
  );
}

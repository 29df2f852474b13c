/**
 * kubemend API Server
 */

import {
  ConfigurationError,
  createChildLogger,
  getConfig,
  validateConfig,
} from '@kubemend/shared';
import { buildApp } from './app.js';
import { initializeServices } from './services/index.js';

const logger = createChildLogger({ component: 'API' });

async function main() {
  const validation = validateConfig();
  if (!validation.valid) {
    throw new ConfigurationError(`Invalid configuration: ${validation.errors?.join('; ')}`, {
      errors: validation.errors,
    });
  }

  // Load configuration
  const config = getConfig();

  // Initialize services (K8sClient, RemediationEngine)
  const services = initializeServices(config);

  const app = await buildApp(config, services);

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    await app.close();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }

  // Start server
  await app.listen({
    port: config.server.port,
    host: config.server.host,
  });

  logger.info(`Server started on ${config.server.host}:${config.server.port}`);
}

main().catch((err) => {
  logger.error({ err }, 'Failed to start server');
  process.exit(1);
});

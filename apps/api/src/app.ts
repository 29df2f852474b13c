/**
 * Fastify application factory, shared by the server entry point and tests
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { Config } from '@kubemend/shared';
import { registerRoutes } from './routes/index.js';
import type { AppServices } from './services/index.js';

export async function buildApp(config: Config, services: AppServices): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use our own logger
  });

  // Decorate app with services for dependency injection
  app.decorate('services', services);

  await app.register(cors, {
    origin: config.server.corsOrigin === '*' ? true : config.server.corsOrigin.split(','),
  });

  await registerRoutes(app, config);

  // Liveness probe outside the versioned prefix
  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  return app;
}

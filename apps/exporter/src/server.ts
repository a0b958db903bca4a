/**
 * Metrics Server
 */

import Fastify, { type FastifyInstance } from 'fastify';
import type { Registry } from 'prom-client';
import { registerRoutes } from './routes/index.js';

export interface MetricsServerOptions {
  registry: Registry;
  path: string;
}

export async function createMetricsServer(options: MetricsServerOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use our own logger
  });

  await registerRoutes(app, { registry: options.registry, path: options.path });

  return app;
}

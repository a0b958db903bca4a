/**
 * Exporter Routes
 */

import type { FastifyInstance } from 'fastify';
import { healthRoutes } from './health.js';
import { metricsRoutes, type MetricsRouteOptions } from './metrics.js';

export async function registerRoutes(app: FastifyInstance, metrics: MetricsRouteOptions): Promise<void> {
  await app.register(healthRoutes);
  await app.register(metricsRoutes, metrics);
}

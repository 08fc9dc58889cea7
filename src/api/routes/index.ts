/**
 * Route registration: registers all API route plugins with Fastify.
 */
import type { FastifyInstance } from 'fastify';
import type { RouteDependencies } from '../types.js';
import { admissionRoutes } from './admission.js';
import { healthRoutes } from './health.js';

/** Register all API routes on the Fastify instance. */
export async function registerRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): Promise<void> {
  await fastify.register(healthRoutes);
  await fastify.register(admissionRoutes, deps);
}

/**
 * Builds the Fastify instance serving the admission webhook.
 * Shared by the entrypoint and the route tests.
 */
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { registerErrorHandler } from './error-handler.js';
import { registerRoutes } from './routes/index.js';
import type { RouteDependencies } from './types.js';

/** Create a server with the error handler and all routes registered. */
export async function createServer(deps: RouteDependencies): Promise<FastifyInstance> {
  const server = Fastify({ logger: false });
  registerErrorHandler(server, deps.logger);
  await server.register(registerRoutes, deps);
  return server;
}

import type { FastifyInstance } from 'fastify';

/** Register the liveness endpoint. Async, so Fastify does not wait on a `done` callback. */
export async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get('/health', () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });
}

import type { FastifyInstance } from 'fastify';

/** GET /health: liveness probe. */
export function healthRoutes(fastify: FastifyInstance): void {
  fastify.get('/health', () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });
}

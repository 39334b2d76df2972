/**
 * HTTP server factory: Fastify with the error handler and routes wired.
 */
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { registerErrorHandler } from './error-handler.js';
import { registerRoutes } from './routes/index.js';
import type { RouteDependencies } from './types.js';

export function createServer(deps: RouteDependencies): FastifyInstance {
  const server = Fastify({
    logger: false,
  });

  registerErrorHandler(server, deps.logger);
  registerRoutes(server, deps);

  return server;
}

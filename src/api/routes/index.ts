/**
 * Route registration: registers all API routes with Fastify.
 */
import type { FastifyInstance } from 'fastify';
import type { RouteDependencies } from '../types.js';
import { engageWebhookRoutes } from './engage-webhook.js';
import { healthRoutes } from './health.js';

/** Register all API routes on the Fastify instance. */
export function registerRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  healthRoutes(fastify);
  engageWebhookRoutes(fastify, deps);
}

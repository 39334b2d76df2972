/**
 * Global Fastify error handler and response helpers.
 * Maps EngageBridgeError subclasses and ZodError to structured ApiResponse envelopes.
 */
import type { FastifyInstance, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { EngageBridgeError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';
import type { ApiResponse } from './types.js';

// ─── Response Helpers ───────────────────────────────────────────

/** Send an error response wrapped in the ApiResponse envelope. */
export async function sendError(
  reply: FastifyReply,
  code: string,
  message: string,
  statusCode = 500,
  details?: Record<string, unknown>,
): Promise<void> {
  const body: ApiResponse<never> = {
    success: false,
    error: { code, message, ...(details && { details }) },
  };
  await reply.status(statusCode).send(body);
}

// ─── Global Error Handler ───────────────────────────────────────

/** Register the global Fastify error handler. */
export function registerErrorHandler(fastify: FastifyInstance, logger: Logger): void {
  fastify.setErrorHandler(async (error, _request, reply) => {
    // Zod validation errors
    if (error instanceof ZodError) {
      const details: Record<string, unknown> = {
        issues: error.issues.map((i) => ({
          path: i.path.join('.'),
          message: i.message,
        })),
      };
      await sendError(reply, 'VALIDATION_ERROR', 'Request validation failed', 400, details);
      return;
    }

    // EngageBridgeError hierarchy: use the error's own statusCode and code
    if (error instanceof EngageBridgeError) {
      logger.warn('Request failed with EngageBridgeError', {
        component: 'error-handler',
        code: error.code,
        statusCode: error.statusCode,
        message: error.message,
      });
      await sendError(reply, error.code, error.message, error.statusCode, error.context);
      return;
    }

    // Fastify built-in errors (e.g., JSON parse failures)
    if (
      error instanceof Error &&
      'statusCode' in error &&
      typeof error.statusCode === 'number' &&
      error.statusCode < 500
    ) {
      await sendError(reply, 'REQUEST_ERROR', error.message, error.statusCode);
      return;
    }

    // Unknown errors
    const message = error instanceof Error ? error.message : String(error);
    const stack = error instanceof Error ? error.stack : undefined;
    logger.error('Unhandled error in request', {
      component: 'error-handler',
      error: message,
      stack,
    });
    await sendError(reply, 'INTERNAL_ERROR', 'An unexpected error occurred', 500);
  });
}

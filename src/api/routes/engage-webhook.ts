/**
 * Engage webhook route: single entry point for everything the
 * platform sends us.
 *
 * - GET or POST with hub.mode/hub.challenge: subscription handshake
 * - POST REST hook deliveries: imported customer content
 * - POST custom source SDK calls: agent replies and housekeeping
 *
 * Bodies reach the handler as raw text and are parsed here, so the
 * handshake works whatever the body holds and signatures are checked
 * against the bytes the platform signed. A body that is not JSON is
 * handed on as undefined and classified as unknown.
 *
 * The adapter writes any synchronous answer itself; otherwise we ack
 * with 200 once the turn has finished.
 */
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { WebhookRequest, WebhookResponse } from '@/adapter/types.js';
import type { Logger } from '@/observability/logger.js';
import type { RouteDependencies } from '../types.js';

// ─── Helpers ────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parse a raw body as JSON; undefined when it is empty or not JSON. */
export function parseJsonBody(rawBody: string | undefined, logger: Logger): unknown {
  if (rawBody === undefined || rawBody.trim() === '') return undefined;

  try {
    const parsed: unknown = JSON.parse(rawBody);
    return parsed;
  } catch (error) {
    logger.debug('Engage request body is not JSON', {
      component: 'engage-webhook',
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}

/** Expose a Fastify request to the adapter. */
export function toWebhookRequest(request: FastifyRequest, logger: Logger): WebhookRequest {
  const rawBody = typeof request.body === 'string' ? request.body : undefined;
  return {
    method: request.method,
    url: request.url,
    query: isRecord(request.query) ? request.query : {},
    headers: request.headers,
    body: parseJsonBody(rawBody, logger),
    ...(rawBody !== undefined && { rawBody }),
  };
}

/** Expose a Fastify reply to the adapter. */
export function toWebhookResponse(reply: FastifyReply): WebhookResponse {
  // reply.sent only flips once the payload is flushed, which onSend hooks can delay.
  let written = false;
  return {
    get sent(): boolean {
      return written || reply.sent;
    },
    send(statusCode: number, payload?: unknown): void {
      written = true;
      void reply.status(statusCode).send(payload);
    },
  };
}

/** Abort signal that fires when the client goes away before we answered. */
function disconnectSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.on('close', () => {
    if (!reply.raw.writableFinished) controller.abort();
  });
  return controller.signal;
}

// ─── Route Registration ─────────────────────────────────────────

export function engageWebhookRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  const { adapter, bot, webhookPath, logger } = deps;

  // Own scope, so the raw-text parser does not leak to other routes.
  void fastify.register((scope, _opts, done) => {
    scope.removeAllContentTypeParsers();
    scope.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, parsed) => {
      parsed(null, body);
    });

    scope.route({
      method: ['GET', 'POST'],
      url: webhookPath,
      handler: async (request: FastifyRequest, reply: FastifyReply) => {
        logger.debug('Received Engage request', {
          component: 'engage-webhook',
          method: request.method,
          url: request.url,
        });

        const response = toWebhookResponse(reply);
        await adapter.process(toWebhookRequest(request, logger), response, bot, disconnectSignal(reply));

        if (response.sent) return reply;
        return reply.status(200).send({ ok: true });
      },
    });

    done();
  });
}

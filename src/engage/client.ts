/**
 * Engage Client: talks to the Engage Digital REST API and interprets
 * the requests the platform sends us.
 *
 * Inbound requests come in two shapes:
 * - REST hook deliveries (`{ events: [...] }`) for imported customer content
 * - Custom source SDK calls (`{ action, params }`) for agent replies and
 *   platform housekeeping, optionally signed with X-SMCC-SIGNATURE
 */
import { PlatformApiError } from '@/core/errors.js';
import type { ContentId, SourceId, Thread, ThreadController, ThreadId } from '@/core/types.js';
import type { Activity } from '@/activities/types.js';
import type { PlatformEvent, WebhookRequest, WebhookResponse } from '@/adapter/types.js';
import type { EngageConfig } from '@/config/types.js';
import { HandoffTargets } from '@/handoff/recognizer.js';
import type { HandoffTarget } from '@/handoff/recognizer.js';
import type { Logger } from '@/observability/logger.js';
import { parseSourceSdkCall, parseWebhookDelivery } from './event-parser.js';
import {
  contentResponseSchema,
  SDK_SIGNATURE_HEADER,
  sourceSdkRequestSchema,
  threadResponseSchema,
} from './payloads.js';
import { isValidSourceSignature } from './signature.js';
import type { EngageClient } from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface EngageClientDeps {
  logger: Logger;
}

interface ApiCallOptions {
  method?: 'GET' | 'POST' | 'PUT';
  body?: unknown;
  query?: [string, string][];
}

// ─── Helpers ────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** First value of a query parameter; repeated keys arrive as arrays. */
export function queryValue(query: Readonly<Record<string, unknown>>, key: string): string | undefined {
  const value = query[key];
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

// ─── Client Factory ─────────────────────────────────────────────

/**
 * Create an Engage client bound to one API domain and its handoff categories.
 */
export function createEngageClient(config: EngageConfig, deps: EngageClientDeps): EngageClient {
  const { apiUrl, accessToken, verifyToken, sourceSecret, botCategoryId, agentCategoryId } = config;
  const { logger } = deps;

  async function apiCall(path: string, options: ApiCallOptions = {}): Promise<unknown> {
    const url = new URL(`${apiUrl}${path}`);
    for (const [key, value] of options.query ?? []) {
      url.searchParams.append(key, value);
    }

    const response = await fetch(url.toString(), {
      method: options.method ?? 'GET',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${accessToken}`,
      },
      ...(options.body !== undefined && { body: JSON.stringify(options.body) }),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new PlatformApiError(path, response.status, text);
    }

    return response.json();
  }

  function controllerOf(categoryIds: readonly string[]): ThreadController {
    if (categoryIds.includes(agentCategoryId)) return 'agent';
    if (categoryIds.includes(botCategoryId)) return 'bot';
    return 'unknown';
  }

  return {
    getActivityFromRequest(request: WebhookRequest, response: WebhookResponse): Promise<PlatformEvent> {
      const { body } = request;

      if (isRecord(body) && 'action' in body) {
        // Without the raw bytes, fall back to the compact serialization.
        const signedPayload = request.rawBody ?? JSON.stringify(body);
        if (
          sourceSecret &&
          !isValidSourceSignature(sourceSecret, signedPayload, request.headers[SDK_SIGNATURE_HEADER])
        ) {
          logger.warn('Rejected source SDK call with invalid signature', {
            component: 'engage-client',
            url: request.url,
          });
          return Promise.resolve({ kind: 'unknown', reason: 'Invalid source SDK signature' });
        }

        const call = sourceSdkRequestSchema.safeParse(body);
        if (!call.success) {
          return Promise.resolve({ kind: 'unknown', reason: 'Malformed source SDK call' });
        }
        return Promise.resolve(parseSourceSdkCall(call.data, response));
      }

      if (isRecord(body) && 'events' in body) {
        return Promise.resolve(parseWebhookDelivery(body));
      }

      return Promise.resolve({ kind: 'unknown', reason: 'Unrecognized payload shape' });
    },

    verifyWebhook(request: WebhookRequest, response: WebhookResponse, signal?: AbortSignal): Promise<void> {
      if (signal?.aborted) {
        logger.debug('Webhook verification cancelled', { component: 'engage-client' });
        return Promise.resolve();
      }

      const mode = queryValue(request.query, 'hub.mode');
      const token = queryValue(request.query, 'hub.verify_token');
      const challenge = queryValue(request.query, 'hub.challenge');

      if (mode === 'subscribe' && token === verifyToken && challenge) {
        logger.info('Engage webhook verified', { component: 'engage-client' });
        response.send(200, challenge);
        return Promise.resolve();
      }

      logger.warn('Engage webhook verification failed', {
        component: 'engage-client',
        mode,
        hasToken: token !== undefined,
        hasChallenge: challenge !== undefined,
      });
      response.send(403, 'Forbidden');
      return Promise.resolve();
    },

    async sendContent(activity: Activity, sourceId: SourceId): Promise<ContentId> {
      const data = await apiCall('/contents', {
        method: 'POST',
        body: {
          body: activity.text ?? '',
          source_id: sourceId,
          ...(activity.replyToId !== undefined && { in_reply_to_id: activity.replyToId }),
        },
      });

      const content = contentResponseSchema.safeParse(data);
      if (!content.success) {
        throw new PlatformApiError('/contents', 200, 'Response is missing the content id');
      }
      return content.data.id as ContentId;
    },

    async getThreadById(threadId: ThreadId): Promise<Thread | null> {
      const path = `/content_threads/${encodeURIComponent(threadId)}`;
      let data: unknown;
      try {
        data = await apiCall(path);
      } catch (error) {
        if (error instanceof PlatformApiError && error.status === 404) {
          return null;
        }
        throw error;
      }

      const thread = threadResponseSchema.safeParse(data);
      if (!thread.success) {
        throw new PlatformApiError(path, 200, 'Unexpected thread payload');
      }

      const { id, source_id: sourceId, title, thread_category_ids: categoryIds } = thread.data;
      return {
        id: id as ThreadId,
        ...(sourceId ? { sourceId: sourceId as SourceId } : {}),
        ...(title ? { title } : {}),
        categoryIds,
        controller: controllerOf(categoryIds),
      };
    },

    async handoffConversationControlTo(target: HandoffTarget, thread: Thread): Promise<void> {
      if (target === HandoffTargets.None) return;

      const [add, remove] = target === HandoffTargets.Agent
        ? [agentCategoryId, botCategoryId]
        : [botCategoryId, agentCategoryId];

      // Full category set, so the same thread always yields the same update.
      const categoryIds = thread.categoryIds.filter((id) => id !== remove && id !== add);
      categoryIds.push(add);

      await apiCall(`/content_threads/${encodeURIComponent(thread.id)}/update_categories`, {
        method: 'PUT',
        query: categoryIds.map((id): [string, string] => ['thread_category_ids[]', id]),
      });
    },
  };
}

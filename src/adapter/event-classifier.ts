/**
 * Event Classifier: decides what kind of inbound request we are looking at.
 *
 * The hub.mode handshake is detected from the query string alone, before
 * any payload parsing: verification calls may carry no usable body.
 * Classification never throws; failures become 'unknown'.
 */
import type { EngageClient } from '@/engage/types.js';
import type { Logger } from '@/observability/logger.js';
import type { ClassifiedEvent, WebhookRequest, WebhookResponse } from './types.js';

/** Query key the platform sets during subscription validation. */
export const VERIFY_WEBHOOK_QUERY_KEY = 'hub.mode';

export interface EventClassifier {
  classify(request: WebhookRequest, response: WebhookResponse): Promise<ClassifiedEvent>;
}

export interface EventClassifierDeps {
  client: EngageClient;
  logger: Logger;
}

export function createEventClassifier(deps: EventClassifierDeps): EventClassifier {
  const { client, logger } = deps;

  return {
    async classify(request: WebhookRequest, response: WebhookResponse): Promise<ClassifiedEvent> {
      if (VERIFY_WEBHOOK_QUERY_KEY in request.query) {
        return { kind: 'verifyWebhook' };
      }

      try {
        return await client.getActivityFromRequest(request, response);
      } catch (error) {
        const reason = error instanceof Error ? error.message : 'Unknown classification error';
        logger.warn('Failed to classify Engage request', {
          component: 'event-classifier',
          url: request.url,
          error: reason,
        });
        return { kind: 'unknown', reason };
      }
    },
  };
}

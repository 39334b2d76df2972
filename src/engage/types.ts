import type { Activity } from '@/activities/types.js';
import type { PlatformEvent, WebhookRequest, WebhookResponse } from '@/adapter/types.js';
import type { ContentId, SourceId, Thread, ThreadId } from '@/core/types.js';
import type { HandoffTarget } from '@/handoff/recognizer.js';

/**
 * Client for the Engage platform: payload parsing, the webhook handshake
 * and the REST calls the adapter needs.
 */
export interface EngageClient {
  /**
   * Turn a webhook or source SDK request into a classified event.
   * May write the synchronous reply the platform expects (SDK actions).
   */
  getActivityFromRequest(request: WebhookRequest, response: WebhookResponse): Promise<PlatformEvent>;
  /** Answer the hub.mode subscription handshake. */
  verifyWebhook(request: WebhookRequest, response: WebhookResponse, signal?: AbortSignal): Promise<void>;
  /** Post a message into the source; resolves with the created content id. */
  sendContent(activity: Activity, sourceId: SourceId): Promise<ContentId>;
  getThreadById(threadId: ThreadId): Promise<Thread | null>;
  /** Switch the thread's controller. 'none' leaves it untouched. */
  handoffConversationControlTo(target: HandoffTarget, thread: Thread): Promise<void>;
}

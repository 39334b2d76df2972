/**
 * Engage event parser: maps REST hook deliveries and source SDK calls
 * onto classified events with normalized activities.
 */
import { nanoid } from 'nanoid';
import { createActivity } from '@/activities/factory.js';
import { ActivityTypes } from '@/activities/types.js';
import type { EngageChannelData } from '@/activities/channel-data.js';
import type { PlatformEvent, WebhookResponse } from '@/adapter/types.js';
import type { SourceId, ThreadId } from '@/core/types.js';
import {
  contentMetadataSchema,
  sdkMessageParamsSchema,
  SourceSdkActions,
  WEBHOOK_EVENT_CONTENT_IMPORTED,
  webhookPayloadSchema,
} from './payloads.js';
import type { SourceSdkRequest } from './payloads.js';

/** Capabilities advertised in answer to `implementation.info`. */
export const IMPLEMENTATION_INFO = {
  objects: {
    messages: ['create', 'list'],
    private_messages: ['create', 'list'],
    threads: ['list'],
  },
  options: [],
} as const;

const LIST_ACTIONS = new Set<string>([
  SourceSdkActions.MessagesList,
  SourceSdkActions.PrivateMessagesList,
  SourceSdkActions.ThreadsList,
]);

function unknownEvent(reason: string): PlatformEvent {
  return { kind: 'unknown', reason };
}

// ─── REST Hooks ─────────────────────────────────────────────────

/**
 * Parse a REST hook delivery. Only `content.imported` is handled;
 * the first such event in the delivery wins.
 */
export function parseWebhookDelivery(body: unknown): PlatformEvent {
  const parsed = webhookPayloadSchema.safeParse(body);
  if (!parsed.success) return unknownEvent('Malformed webhook delivery');

  const { events } = parsed.data;
  const event = events.find((e) => e.type === WEBHOOK_EVENT_CONTENT_IMPORTED);
  if (!event) {
    const types = events.map((e) => e.type).join(', ');
    return unknownEvent(`Unsupported webhook event(s): ${types || 'none'}`);
  }

  const metadata = contentMetadataSchema.safeParse(event.resource?.metadata);
  if (!event.resource || !metadata.success) {
    return unknownEvent(`Event ${event.id} has no usable content metadata`);
  }

  const content = metadata.data;
  const createdAt = content.created_at ? new Date(content.created_at) : undefined;
  // Attachment-only contents carry no text for the bot.
  if (!content.body) return { kind: 'contentImported', activity: null };

  const channelData: EngageChannelData = {
    sourceId: content.source_id as SourceId,
    threadId: content.thread_id as ThreadId,
  };

  const activity = createActivity({
    id: event.resource.id,
    type: ActivityTypes.Message,
    // Unparseable dates fall back to the receive time.
    timestamp: createdAt && !Number.isNaN(createdAt.getTime()) ? createdAt : undefined,
    from: { id: content.author_id ?? 'anonymous', role: 'user' },
    recipient: { id: content.source_id, role: 'bot' },
    conversation: { id: content.thread_id },
    text: content.body,
    replyToId: content.in_reply_to_id ?? undefined,
    channelData,
  });

  return { kind: 'contentImported', activity };
}

// ─── Custom Source SDK ──────────────────────────────────────────

/**
 * Parse a source SDK call and write the synchronous answer the
 * platform waits for.
 */
export function parseSourceSdkCall(call: SourceSdkRequest, response: WebhookResponse): PlatformEvent {
  const { action, params } = call;

  if (action === SourceSdkActions.ImplementationInfo) {
    response.send(200, IMPLEMENTATION_INFO);
    return { kind: 'action', activity: null };
  }

  if (action === SourceSdkActions.MessagesCreate || action === SourceSdkActions.PrivateMessagesCreate) {
    const message = sdkMessageParamsSchema.safeParse(params);
    if (!message.success) return unknownEvent(`Malformed ${action} params`);

    const { body, thread_id: threadId, in_reply_to_id: inReplyToId, author_id: authorId } = message.data;
    const id = nanoid();
    const createdAt = new Date();

    const activity = createActivity({
      id,
      type: ActivityTypes.Message,
      timestamp: createdAt,
      from: { id: authorId ?? 'agent', role: 'agent' },
      conversation: threadId ? { id: threadId } : undefined,
      text: body,
      name: action,
      value: params,
      replyToId: inReplyToId,
    });

    response.send(200, {
      id,
      body,
      thread_id: threadId ?? null,
      in_reply_to_id: inReplyToId ?? null,
      created_at: createdAt.toISOString(),
    });
    return { kind: 'intervention', activity };
  }

  if (LIST_ACTIONS.has(action)) {
    response.send(200, []);
    return {
      kind: 'action',
      activity: createActivity({ type: ActivityTypes.Event, name: action, value: params }),
    };
  }

  return unknownEvent(`Unsupported source SDK action "${action}"`);
}

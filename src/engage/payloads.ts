/**
 * Zod schemas for Engage payloads: REST hook deliveries, custom source
 * SDK calls and the REST API responses we read.
 */
import { z } from 'zod';

// ─── REST Hooks ─────────────────────────────────────────────────

export const WEBHOOK_EVENT_CONTENT_IMPORTED = 'content.imported';

export const webhookEventSchema = z.object({
  type: z.string().min(1),
  id: z.string().min(1),
  issued_at: z.string().optional(),
  resource: z
    .object({
      type: z.string(),
      id: z.string().min(1),
      metadata: z.record(z.unknown()).optional(),
    })
    .optional(),
});

export const webhookPayloadSchema = z.object({
  id: z.string().optional(),
  domain_id: z.string().optional(),
  events: z.array(webhookEventSchema),
});

/** Metadata of an imported content resource. */
export const contentMetadataSchema = z
  .object({
    body: z.string().nullish(),
    thread_id: z.string().min(1),
    source_id: z.string().min(1),
    author_id: z.string().nullish(),
    in_reply_to_id: z.string().nullish(),
    created_at: z.string().nullish(),
  })
  .passthrough();


// ─── Custom Source SDK ──────────────────────────────────────────

export const SDK_SIGNATURE_HEADER = 'x-smcc-signature';

export const SourceSdkActions = {
  ImplementationInfo: 'implementation.info',
  MessagesCreate: 'messages.create',
  PrivateMessagesCreate: 'private_messages.create',
  MessagesList: 'messages.list',
  PrivateMessagesList: 'private_messages.list',
  ThreadsList: 'threads.list',
} as const;

export const sourceSdkRequestSchema = z.object({
  action: z.string().min(1),
  params: z.record(z.unknown()).default({}),
});

export const sdkMessageParamsSchema = z
  .object({
    body: z.string(),
    thread_id: z.string().min(1).optional(),
    in_reply_to_id: z.string().min(1).optional(),
    author_id: z.string().min(1).optional(),
  })
  .passthrough();

export type SourceSdkRequest = z.infer<typeof sourceSdkRequestSchema>;

// ─── REST API Responses ─────────────────────────────────────────

export const threadResponseSchema = z.object({
  id: z.string().min(1),
  source_id: z.string().nullish(),
  title: z.string().nullish(),
  thread_category_ids: z.array(z.string()).default([]),
});

export const contentResponseSchema = z.object({
  id: z.string().min(1),
});

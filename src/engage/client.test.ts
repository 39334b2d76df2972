import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createEngageClient } from './client.js';
import { computeSourceSignature } from './signature.js';
import type { EngageConfig } from '@/config/types.js';
import type { SourceId, ThreadId } from '@/core/types.js';
import { PlatformApiError } from '@/core/errors.js';
import {
  createContentImportedDelivery,
  createMockLogger,
  createThread,
  createWebhookRequest,
  createWebhookResponse,
} from '@/testing/fixtures/engage.js';

const API_URL = 'https://engage.test/1.0';
const UPDATE_CATEGORIES_URL = `${API_URL}/content_threads/thread-1/update_categories`;

const config: EngageConfig = {
  apiUrl: API_URL,
  accessToken: 'test-token',
  verifyToken: 'test-verify',
  botCategoryId: 'cat-bot',
  agentCategoryId: 'cat-agent',
};

function okResponse(data: unknown): Response {
  return { ok: true, status: 200, json: () => Promise.resolve(data) } as Response;
}

function errorResponse(status: number, text: string): Response {
  return { ok: false, status, text: () => Promise.resolve(text) } as Response;
}

describe('EngageClient', () => {
  beforeEach(() => {
    vi.stubGlobal('fetch', vi.fn());
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('sendContent', () => {
    it('posts the reply to the source and returns the content id', async () => {
      vi.mocked(fetch).mockResolvedValue(okResponse({ id: 'content-9', body: 'Hi' }));
      const client = createEngageClient(config, { logger: createMockLogger() });

      const id = await client.sendContent(
        { type: 'message', text: 'Hi', replyToId: 'content-in-1' },
        'S1' as SourceId,
      );

      expect(id).toBe('content-9');
      // eslint-disable-next-line @typescript-eslint/unbound-method
      expect(fetch).toHaveBeenCalledWith(`${API_URL}/contents`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': 'Bearer test-token',
        },
        body: JSON.stringify({ body: 'Hi', source_id: 'S1', in_reply_to_id: 'content-in-1' }),
      });
    });

    it('throws PlatformApiError when the API refuses the content', async () => {
      vi.mocked(fetch).mockResolvedValue(errorResponse(422, 'body is too long'));
      const client = createEngageClient(config, { logger: createMockLogger() });

      await expect(
        client.sendContent({ type: 'message', text: 'Hi' }, 'S1' as SourceId),
      ).rejects.toThrow('Engage API error 422 on /contents: body is too long');
    });

    it('throws when the response has no id', async () => {
      vi.mocked(fetch).mockResolvedValue(okResponse({}));
      const client = createEngageClient(config, { logger: createMockLogger() });

      await expect(
        client.sendContent({ type: 'message', text: 'Hi' }, 'S1' as SourceId),
      ).rejects.toBeInstanceOf(PlatformApiError);
    });
  });

  describe('getThreadById', () => {
    it('maps the thread and derives the controller from its categories', async () => {
      vi.mocked(fetch).mockResolvedValue(okResponse({
        id: 'thread-1',
        source_id: 'source-1',
        title: 'Order question',
        thread_category_ids: ['cat-vip', 'cat-agent'],
      }));
      const client = createEngageClient(config, { logger: createMockLogger() });

      const thread = await client.getThreadById('thread-1' as ThreadId);

      expect(thread).toEqual({
        id: 'thread-1',
        sourceId: 'source-1',
        title: 'Order question',
        categoryIds: ['cat-vip', 'cat-agent'],
        controller: 'agent',
      });
      // eslint-disable-next-line @typescript-eslint/unbound-method
      expect(fetch).toHaveBeenCalledWith(
        `${API_URL}/content_threads/thread-1`,
        expect.objectContaining({ method: 'GET' }),
      );
    });

    it('reports an unknown controller when no handoff category is set', async () => {
      vi.mocked(fetch).mockResolvedValue(okResponse({ id: 'thread-2' }));
      const client = createEngageClient(config, { logger: createMockLogger() });

      const thread = await client.getThreadById('thread-2' as ThreadId);

      expect(thread).toEqual({ id: 'thread-2', categoryIds: [], controller: 'unknown' });
    });

    it('returns null for a missing thread', async () => {
      vi.mocked(fetch).mockResolvedValue(errorResponse(404, 'Not found'));
      const client = createEngageClient(config, { logger: createMockLogger() });

      expect(await client.getThreadById('unknown' as ThreadId)).toBeNull();
    });

    it('propagates other API errors', async () => {
      vi.mocked(fetch).mockResolvedValue(errorResponse(500, 'boom'));
      const client = createEngageClient(config, { logger: createMockLogger() });

      await expect(client.getThreadById('thread-1' as ThreadId)).rejects.toThrow(
        'Engage API error 500 on /content_threads/thread-1: boom',
      );
    });
  });

  describe('handoffConversationControlTo', () => {
    it('swaps the bot category for the agent category', async () => {
      vi.mocked(fetch).mockResolvedValue(okResponse({ id: 'thread-1' }));
      const client = createEngageClient(config, { logger: createMockLogger() });

      await client.handoffConversationControlTo('agent', createThread({ categoryIds: ['cat-bot', 'cat-vip'] }));

      // eslint-disable-next-line @typescript-eslint/unbound-method
      expect(fetch).toHaveBeenCalledWith(
        `${UPDATE_CATEGORIES_URL}?thread_category_ids%5B%5D=cat-vip&thread_category_ids%5B%5D=cat-agent`,
        expect.objectContaining({ method: 'PUT' }),
      );
    });

    it('swaps the agent category for the bot category', async () => {
      vi.mocked(fetch).mockResolvedValue(okResponse({ id: 'thread-1' }));
      const client = createEngageClient(config, { logger: createMockLogger() });

      await client.handoffConversationControlTo(
        'bot',
        createThread({ categoryIds: ['cat-agent'], controller: 'agent' }),
      );

      // eslint-disable-next-line @typescript-eslint/unbound-method
      expect(fetch).toHaveBeenCalledWith(
        `${UPDATE_CATEGORIES_URL}?thread_category_ids%5B%5D=cat-bot`,
        expect.objectContaining({ method: 'PUT' }),
      );
    });

    it('sends the same update when the thread is already in the target state', async () => {
      vi.mocked(fetch).mockResolvedValue(okResponse({ id: 'thread-1' }));
      const client = createEngageClient(config, { logger: createMockLogger() });

      await client.handoffConversationControlTo('agent', createThread({ categoryIds: ['cat-bot', 'cat-vip'] }));
      await client.handoffConversationControlTo(
        'agent',
        createThread({ categoryIds: ['cat-vip', 'cat-agent'], controller: 'agent' }),
      );

      const urls = vi.mocked(fetch).mock.calls.map(([url]) => url);
      expect(urls).toHaveLength(2);
      expect(urls[0]).toBe(urls[1]);
    });

    it('does not call the API for none', async () => {
      const client = createEngageClient(config, { logger: createMockLogger() });

      await client.handoffConversationControlTo('none', createThread());

      // eslint-disable-next-line @typescript-eslint/unbound-method
      expect(fetch).not.toHaveBeenCalled();
    });
  });

  describe('getActivityFromRequest', () => {
    it('parses REST hook deliveries', async () => {
      const client = createEngageClient(config, { logger: createMockLogger() });

      const event = await client.getActivityFromRequest(
        createWebhookRequest({ body: createContentImportedDelivery() }),
        createWebhookResponse(),
      );

      expect(event).toMatchObject({ kind: 'contentImported', activity: { id: 'content-in-1' } });
    });

    it('accepts a correctly signed source SDK call', async () => {
      const client = createEngageClient({ ...config, sourceSecret: 'test-secret' }, { logger: createMockLogger() });
      const body = { action: 'messages.create', params: { body: 'From agent', thread_id: 'thread-1' } };

      const event = await client.getActivityFromRequest(
        createWebhookRequest({
          headers: { 'x-smcc-signature': computeSourceSignature('test-secret', JSON.stringify(body)) },
          body,
        }),
        createWebhookResponse(),
      );

      expect(event).toMatchObject({ kind: 'intervention', activity: { text: 'From agent' } });
    });

    it('checks the signature against the raw body when it is available', async () => {
      const client = createEngageClient({ ...config, sourceSecret: 'test-secret' }, { logger: createMockLogger() });
      const rawBody = '{"action": "messages.create", "params": {"body": "price \\u003c 5", "thread_id": "thread-1"}}';

      const event = await client.getActivityFromRequest(
        createWebhookRequest({
          headers: { 'x-smcc-signature': computeSourceSignature('test-secret', rawBody) },
          body: { action: 'messages.create', params: { body: 'price < 5', thread_id: 'thread-1' } },
          rawBody,
        }),
        createWebhookResponse(),
      );

      expect(event).toMatchObject({ kind: 'intervention', activity: { text: 'price < 5' } });
    });

    it('rejects a source SDK call with a bad signature', async () => {
      const logger = createMockLogger();
      const client = createEngageClient({ ...config, sourceSecret: 'test-secret' }, { logger });
      const response = createWebhookResponse();

      const event = await client.getActivityFromRequest(
        createWebhookRequest({
          headers: { 'x-smcc-signature': 'deadbeef' },
          body: { action: 'implementation.info', params: {} },
        }),
        response,
      );

      expect(event).toEqual({ kind: 'unknown', reason: 'Invalid source SDK signature' });
      expect(response.sent).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith('Rejected source SDK call with invalid signature', {
        component: 'engage-client',
        url: '/api/engage',
      });
    });

    it('accepts unsigned calls when no secret is configured', async () => {
      const client = createEngageClient(config, { logger: createMockLogger() });
      const response = createWebhookResponse();

      const event = await client.getActivityFromRequest(
        createWebhookRequest({ body: { action: 'implementation.info' } }),
        response,
      );

      expect(event).toEqual({ kind: 'action', activity: null });
      expect(response.statusCode).toBe(200);
    });

    it('reports a malformed source SDK call', async () => {
      const client = createEngageClient(config, { logger: createMockLogger() });

      const event = await client.getActivityFromRequest(
        createWebhookRequest({ body: { action: 42 } }),
        createWebhookResponse(),
      );

      expect(event).toEqual({ kind: 'unknown', reason: 'Malformed source SDK call' });
    });

    it('reports unrecognized payloads', async () => {
      const client = createEngageClient(config, { logger: createMockLogger() });

      const event = await client.getActivityFromRequest(
        createWebhookRequest({ body: 'plain text' }),
        createWebhookResponse(),
      );

      expect(event).toEqual({ kind: 'unknown', reason: 'Unrecognized payload shape' });
    });
  });

  describe('verifyWebhook', () => {
    it('echoes the challenge for a valid subscription', async () => {
      const client = createEngageClient(config, { logger: createMockLogger() });
      const response = createWebhookResponse();

      await client.verifyWebhook(
        createWebhookRequest({
          method: 'GET',
          query: { 'hub.mode': 'subscribe', 'hub.verify_token': 'test-verify', 'hub.challenge': 'challenge-123' },
        }),
        response,
      );

      expect(response.statusCode).toBe(200);
      expect(response.payload).toBe('challenge-123');
    });

    it('answers 403 for a wrong token', async () => {
      const client = createEngageClient(config, { logger: createMockLogger() });
      const response = createWebhookResponse();

      await client.verifyWebhook(
        createWebhookRequest({
          method: 'GET',
          query: { 'hub.mode': 'subscribe', 'hub.verify_token': 'wrong', 'hub.challenge': 'challenge-123' },
        }),
        response,
      );

      expect(response.statusCode).toBe(403);
      expect(response.payload).toBe('Forbidden');
    });

    it('writes nothing when already cancelled', async () => {
      const client = createEngageClient(config, { logger: createMockLogger() });
      const response = createWebhookResponse();
      const controller = new AbortController();
      controller.abort();

      await client.verifyWebhook(
        createWebhookRequest({ method: 'GET', query: { 'hub.mode': 'subscribe' } }),
        response,
        controller.signal,
      );

      expect(response.sent).toBe(false);
    });
  });
});

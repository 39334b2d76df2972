/**
 * Engage Adapter: bridges Engage webhooks and a bot's turn pipeline.
 *
 * Inbound flow per request:
 * 1. Classify (verification / intervention / action / imported content / unknown)
 * 2. Verification → answer the handshake, no bot turn
 * 3. Intervention, action → run the bot once, no handoff recognition
 * 4. Imported content → recognize handoff, transfer control if asked,
 *    then run the bot unless the customer asked for an agent
 *
 * The handoff transfer always settles before the bot turn starts.
 * Cancellation is cooperative: the signal reaches verification and the
 * bot, but in-flight Engage API calls are not interrupted.
 */
import { tryGetChannelData, getChannelData } from '@/activities/channel-data.js';
import { ActivityTypes } from '@/activities/types.js';
import type { Activity, ResourceResponse } from '@/activities/types.js';
import { createTurnContext } from '@/bot/turn-context.js';
import type { Bot, BotAdapter, TurnContext, TurnErrorHandler } from '@/bot/types.js';
import { NotSupportedError, ValidationError } from '@/core/errors.js';
import type { EngageClient } from '@/engage/types.js';
import { createConversationControlCoordinator } from '@/handoff/coordinator.js';
import type { ConversationControlCoordinator } from '@/handoff/coordinator.js';
import { HandoffTargets } from '@/handoff/recognizer.js';
import type { HandoffRequestRecognizer, HandoffTarget } from '@/handoff/recognizer.js';
import type { Logger } from '@/observability/logger.js';
import { createEventClassifier } from './event-classifier.js';
import type { EventClassifier } from './event-classifier.js';
import type { WebhookRequest, WebhookResponse } from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface EngageAdapterDeps {
  client: EngageClient;
  recognizer: HandoffRequestRecognizer;
  logger: Logger;
  /** Defaults to a coordinator over `client`. */
  coordinator?: ConversationControlCoordinator;
  /** Defaults to a classifier over `client`. */
  classifier?: EventClassifier;
  /** Receives errors thrown by the bot; without it they propagate to the caller. */
  onTurnError?: TurnErrorHandler;
}

export interface EngageAdapter extends BotAdapter {
  /** Handle one inbound Engage HTTP request. */
  process(
    request: WebhookRequest,
    response: WebhookResponse,
    bot: Bot,
    signal?: AbortSignal,
  ): Promise<void>;
}

// ─── Adapter Factory ────────────────────────────────────────────

export function createEngageAdapter(deps: EngageAdapterDeps): EngageAdapter {
  const { client, recognizer, logger, onTurnError } = deps;
  const coordinator = deps.coordinator ?? createConversationControlCoordinator({ client, logger });
  const classifier = deps.classifier ?? createEventClassifier({ client, logger });

  async function runPipeline(activity: Activity, bot: Bot, signal?: AbortSignal): Promise<void> {
    const context = createTurnContext(adapter, activity);
    try {
      await bot.onTurn(context, signal);
    } catch (error) {
      if (!onTurnError) throw error;
      logger.error('Bot turn failed', {
        component: 'engage-adapter',
        activityId: activity.id,
        error: error instanceof Error ? error.message : String(error),
      });
      await onTurnError(context, error);
    }
  }

  /** Transfer control as requested. Failures are logged and swallowed so routing can continue. */
  async function transferControl(target: HandoffTarget, activity: Activity): Promise<void> {
    if (target === HandoffTargets.None) return;

    try {
      const { threadId } = getChannelData(activity);
      if (threadId === undefined) {
        throw new ValidationError('Imported content has no thread id', { activityId: activity.id });
      }
      await coordinator.handoff(target, threadId);
    } catch (error) {
      logger.error('Handoff failed', {
        component: 'engage-adapter',
        activityId: activity.id,
        target,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async function processImportedContent(activity: Activity, bot: Bot, signal?: AbortSignal): Promise<void> {
    const target = await recognizer.recognizeHandoffRequest(activity);
    await transferControl(target, activity);

    // An agent request keeps the bot out of the turn, even when the transfer failed.
    if (target === HandoffTargets.Agent) {
      logger.debug('Message routed to agent, bot turn skipped', {
        component: 'engage-adapter',
        activityId: activity.id,
      });
      return;
    }

    await runPipeline(activity, bot, signal);
  }

  const adapter: EngageAdapter = {
    async process(
      request: WebhookRequest,
      response: WebhookResponse,
      bot: Bot,
      signal?: AbortSignal,
    ): Promise<void> {
      if (!request) throw new ValidationError('request is required');
      if (!response) throw new ValidationError('response is required');
      if (!bot) throw new ValidationError('bot is required');

      const event = await classifier.classify(request, response);

      switch (event.kind) {
        case 'verifyWebhook':
          await client.verifyWebhook(request, response, signal);
          return;

        case 'intervention':
        case 'action':
          if (event.activity) {
            await runPipeline(event.activity, bot, signal);
          }
          return;

        case 'contentImported':
          if (event.activity) {
            await processImportedContent(event.activity, bot, signal);
          }
          return;

        case 'unknown':
          logger.warn('Unsupported Engage webhook or payload', {
            component: 'engage-adapter',
            url: request.url,
            reason: event.reason,
          });
          return;
      }
    },

    async sendActivities(context: TurnContext, activities: Activity[]): Promise<ResourceResponse[]> {
      if (!Array.isArray(activities)) {
        throw new ValidationError('activities must be an array');
      }

      const responses: ResourceResponse[] = [];

      for (const activity of activities) {
        if (activity.type !== ActivityTypes.Message) {
          logger.trace('Skipped activity, only messages are sent to Engage', {
            component: 'engage-adapter',
            activityId: activity.id,
            activityType: activity.type,
          });
          continue;
        }

        const channelData = tryGetChannelData(activity) ?? tryGetChannelData(context.activity);
        if (!channelData) {
          logger.trace('Skipped message without Engage channel data', {
            component: 'engage-adapter',
            activityId: activity.id,
          });
          continue;
        }

        const id = await client.sendContent(activity, channelData.sourceId);
        responses.push({ id });
      }

      return responses;
    },

    updateActivity(): Promise<ResourceResponse> {
      return Promise.reject(new NotSupportedError('updateActivity'));
    },

    deleteActivity(): Promise<void> {
      return Promise.reject(new NotSupportedError('deleteActivity'));
    },
  };

  return adapter;
}

/**
 * Turn context: binds one inbound activity to the adapter that
 * delivered it, so replies flow back through the same channel.
 */
import { ActivityTypes } from '@/activities/types.js';
import type { Activity, ResourceResponse } from '@/activities/types.js';
import type { BotAdapter, TurnContext } from './types.js';

/**
 * Stamp conversation addressing from the inbound activity onto a reply.
 * Fields the bot set explicitly win.
 */
export function applyConversationReference(reply: Partial<Activity>, inbound: Activity): Activity {
  return {
    ...reply,
    type: reply.type ?? ActivityTypes.Message,
    channelId: reply.channelId ?? inbound.channelId,
    conversation: reply.conversation ?? inbound.conversation,
    from: reply.from ?? inbound.recipient,
    recipient: reply.recipient ?? inbound.from,
    replyToId: reply.replyToId ?? inbound.id,
  };
}

/** Create the TurnContext for a single inbound activity. */
export function createTurnContext(adapter: BotAdapter, activity: Activity): TurnContext {
  let responded = false;

  const context: TurnContext = {
    adapter,
    activity,

    get responded(): boolean {
      return responded;
    },

    async sendActivity(activityOrText: Partial<Activity> | string): Promise<ResourceResponse | undefined> {
      const reply: Partial<Activity> = typeof activityOrText === 'string'
        ? { type: ActivityTypes.Message, text: activityOrText }
        : activityOrText;
      const [response] = await context.sendActivities([reply]);
      return response;
    },

    async sendActivities(activities: Partial<Activity>[]): Promise<ResourceResponse[]> {
      const outgoing = activities.map((reply) => applyConversationReference(reply, activity));
      const responses = await adapter.sendActivities(context, outgoing);
      if (responses.length > 0) responded = true;
      return responses;
    },

    updateActivity(updated: Activity): Promise<ResourceResponse> {
      return adapter.updateActivity(context, applyConversationReference(updated, activity));
    },

    deleteActivity(activityId: string): Promise<void> {
      return adapter.deleteActivity(context, {
        activityId,
        conversationId: activity.conversation?.id,
      });
    },
  };

  return context;
}

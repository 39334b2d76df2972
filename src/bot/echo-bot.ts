/**
 * Echo Bot: minimal bot used by the standalone server.
 * Real deployments inject their own Bot.
 */
import { ActivityTypes } from '@/activities/types.js';
import type { Logger } from '@/observability/logger.js';
import type { Bot, TurnContext } from './types.js';

export interface EchoBotDeps {
  logger: Logger;
}

/** Create a bot that echoes customer messages and logs everything else. */
export function createEchoBot(deps: EchoBotDeps): Bot {
  const { logger } = deps;

  return {
    async onTurn(context: TurnContext, signal?: AbortSignal): Promise<void> {
      const { activity } = context;

      if (signal?.aborted) {
        logger.debug('Turn cancelled before the bot ran', {
          component: 'echo-bot',
          activityId: activity.id,
        });
        return;
      }

      // Agent replies arrive as messages from role "agent"; they are not echoed back.
      if (activity.type === ActivityTypes.Message && activity.from?.role !== 'agent') {
        await context.sendActivity(`You said: ${activity.text ?? ''}`);
        return;
      }

      logger.info('Echo bot received non-customer activity', {
        component: 'echo-bot',
        activityId: activity.id,
        activityType: activity.type,
        name: activity.name,
        fromRole: activity.from?.role,
      });
    },
  };
}

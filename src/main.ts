import 'dotenv/config';
import { ActivityTypes } from '@/activities/types.js';
import { createEngageAdapter } from '@/adapter/engage-adapter.js';
import { createServer } from '@/api/server.js';
import { createEchoBot } from '@/bot/echo-bot.js';
import { loadConfig } from '@/config/loader.js';
import { createEngageClient } from '@/engage/client.js';
import { createConversationControlCoordinator } from '@/handoff/coordinator.js';
import { createKeywordHandoffRecognizer } from '@/handoff/recognizer.js';
import { createLogger } from '@/observability/logger.js';

async function start(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.server.logLevel });

  const client = createEngageClient(config.engage, { logger });
  const recognizer = createKeywordHandoffRecognizer(config.handoff);
  const coordinator = createConversationControlCoordinator({ client, logger });

  const adapter = createEngageAdapter({
    client,
    recognizer,
    coordinator,
    logger,
    onTurnError: async (context, error) => {
      logger.error('Unhandled bot error', {
        component: 'main',
        activityId: context.activity.id,
        error: error instanceof Error ? error.message : String(error),
      });
      // Only customer messages have a source to answer into.
      if (context.activity.type === ActivityTypes.Message && context.activity.from?.role === 'user') {
        await context.sendActivity('Sorry, something went wrong. Please try again.');
      }
    },
  });

  const bot = createEchoBot({ logger });

  const server = createServer({
    adapter,
    bot,
    webhookPath: config.webhookPath,
    logger,
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info('Shutting down', { component: 'main', signal });
    await server.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await server.listen({ port: config.server.port, host: config.server.host });
  logger.info('Engage bot adapter listening', {
    component: 'main',
    port: config.server.port,
    host: config.server.host,
    webhookPath: config.webhookPath,
  });
}

start().catch((error: unknown) => {
  const logger = createLogger();
  logger.fatal('Failed to start server', {
    component: 'main',
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});

export type {
  ActivityReference,
  Bot,
  BotAdapter,
  TurnContext,
  TurnErrorHandler,
} from './types.js';

export { applyConversationReference, createTurnContext } from './turn-context.js';
export { createEchoBot } from './echo-bot.js';
export type { EchoBotDeps } from './echo-bot.js';

/**
 * Handoff Recognizer: decides whether a customer message asks to move
 * the conversation to a human agent or back to the bot.
 *
 * Signals:
 * - Customer sends agent keywords (e.g. "talk to a human") → agent
 * - Customer sends bot keywords (e.g. "back to the bot") → bot
 * - Anything else → none
 */
import { z } from 'zod';
import { ActivityTypes } from '@/activities/types.js';
import type { Activity } from '@/activities/types.js';

// ─── Types ──────────────────────────────────────────────────────

export const HandoffTargets = {
  None: 'none',
  Bot: 'bot',
  Agent: 'agent',
} as const;

export type HandoffTarget = (typeof HandoffTargets)[keyof typeof HandoffTargets];

/** A target that actually moves control somewhere. */
export type TransferTarget = Exclude<HandoffTarget, 'none'>;

export interface HandoffRequestRecognizer {
  /** Classify an inbound activity. Side-effect free; unrecognized content yields 'none'. */
  recognizeHandoffRequest(activity: Activity): Promise<HandoffTarget>;
}

export const handoffRecognizerConfigSchema = z.object({
  /** Phrases a customer uses to request a human. */
  agentKeywords: z.array(z.string().min(1)),
  /** Phrases a customer uses to return to the bot. */
  botKeywords: z.array(z.string().min(1)),
});

export type HandoffRecognizerConfig = z.infer<typeof handoffRecognizerConfigSchema>;

// ─── Default Config ─────────────────────────────────────────────

export const DEFAULT_HANDOFF_RECOGNIZER_CONFIG: HandoffRecognizerConfig = {
  agentKeywords: [
    'talk to a human',
    'talk to human',
    'speak to agent',
    'speak to an agent',
    'human agent',
    'real person',
    'hablar con humano',
    'agente humano',
    'quiero hablar con una persona',
    'operador',
  ],
  botKeywords: [
    'talk to the bot',
    'back to the bot',
    'back to bot',
    'volver al bot',
  ],
};

// ─── Helpers ────────────────────────────────────────────────────

function normalize(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

// ─── Recognizer Factory ─────────────────────────────────────────

/**
 * Create a recognizer that matches configured keywords against message text.
 * Agent keywords take precedence when a message matches both lists.
 */
export function createKeywordHandoffRecognizer(
  config: HandoffRecognizerConfig = DEFAULT_HANDOFF_RECOGNIZER_CONFIG,
): HandoffRequestRecognizer {
  const { agentKeywords, botKeywords } = handoffRecognizerConfigSchema.parse(config);
  const agentLower = agentKeywords.map(normalize);
  const botLower = botKeywords.map(normalize);

  return {
    recognizeHandoffRequest(activity: Activity): Promise<HandoffTarget> {
      if (activity.type !== ActivityTypes.Message || !activity.text) {
        return Promise.resolve(HandoffTargets.None);
      }

      const text = normalize(activity.text);

      if (agentLower.some((keyword) => text.includes(keyword))) {
        return Promise.resolve(HandoffTargets.Agent);
      }
      if (botLower.some((keyword) => text.includes(keyword))) {
        return Promise.resolve(HandoffTargets.Bot);
      }
      return Promise.resolve(HandoffTargets.None);
    },
  };
}

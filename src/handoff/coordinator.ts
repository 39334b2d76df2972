/**
 * Conversation Control Coordinator: moves a thread between the bot
 * and human agents on the platform.
 *
 * The thread record (and its current controller) lives on the platform;
 * nothing is cached here. The switch is issued without checking the
 * current controller, so retries are safe.
 */
import type { Thread, ThreadId } from '@/core/types.js';
import type { EngageClient } from '@/engage/types.js';
import type { Logger } from '@/observability/logger.js';
import type { TransferTarget } from './recognizer.js';

// ─── Types ──────────────────────────────────────────────────────

export type HandoffOutcome =
  | { readonly status: 'transferred'; readonly target: TransferTarget; readonly thread: Thread }
  | { readonly status: 'notFound'; readonly target: TransferTarget; readonly threadId: ThreadId };

export interface ConversationControlCoordinator {
  /**
   * Hand the thread over to `target`.
   * Resolves with 'notFound' when the thread does not exist; API failures reject.
   */
  handoff(target: TransferTarget, threadId: ThreadId): Promise<HandoffOutcome>;
}

export interface ConversationControlCoordinatorDeps {
  client: EngageClient;
  logger: Logger;
}

// ─── Coordinator Factory ────────────────────────────────────────

export function createConversationControlCoordinator(
  deps: ConversationControlCoordinatorDeps,
): ConversationControlCoordinator {
  const { client, logger } = deps;

  return {
    async handoff(target: TransferTarget, threadId: ThreadId): Promise<HandoffOutcome> {
      const thread = await client.getThreadById(threadId);

      if (!thread) {
        logger.warn('Could not hand off the conversation, thread not found', {
          component: 'handoff',
          threadId,
          target,
        });
        return { status: 'notFound', target, threadId };
      }

      logger.info('Handing off conversation', {
        component: 'handoff',
        threadId,
        target,
        currentController: thread.controller,
      });

      await client.handoffConversationControlTo(target, thread);

      logger.info('Conversation handed off', {
        component: 'handoff',
        threadId,
        target,
      });

      return { status: 'transferred', target, thread };
    },
  };
}

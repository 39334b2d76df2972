import type { EngageAdapter } from '@/adapter/engage-adapter.js';
import type { Bot } from '@/bot/types.js';
import type { Logger } from '@/observability/logger.js';

// ─── API Response Envelope ───────────────────────────────────────

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

// ─── Route Dependencies (DI) ───────────────────────────────────

/** Dependencies injected into the route plugins. */
export interface RouteDependencies {
  adapter: EngageAdapter;
  bot: Bot;
  /** Path the platform posts webhooks and SDK calls to. */
  webhookPath: string;
  logger: Logger;
}

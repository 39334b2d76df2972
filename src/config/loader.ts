/**
 * Configuration loader: validates environment variables with Zod
 * and assembles the typed AppConfig.
 */
import { EngageBridgeError } from '@/core/errors.js';
import { DEFAULT_HANDOFF_RECOGNIZER_CONFIG } from '@/handoff/recognizer.js';

import { envSchema } from './schema.js';
import type { AppConfig } from './types.js';

// ─── Errors ─────────────────────────────────────────────────────

/**
 * Error thrown when configuration validation fails.
 */
export class ConfigError extends EngageBridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CONFIG_ERROR',
      statusCode: 500,
      context,
      isOperational: false,
    });
    this.name = 'ConfigError';
  }
}

// ─── Configuration Loader ───────────────────────────────────────

/**
 * Loads the adapter configuration from an environment map.
 *
 * Keyword lists fall back to the recognizer defaults when the
 * corresponding variable is absent.
 *
 * @throws ConfigError listing every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigError(
      `Invalid configuration: ${issues.map((i) => `${i.path} (${i.message})`).join(', ')}`,
      { issues },
    );
  }

  const vars = parsed.data;

  return {
    server: {
      port: vars.PORT,
      host: vars.HOST,
      logLevel: vars.LOG_LEVEL,
      environment: vars.NODE_ENV,
    },
    engage: {
      apiUrl: vars.ENGAGE_API_URL.replace(/\/+$/, ''),
      accessToken: vars.ENGAGE_ACCESS_TOKEN,
      verifyToken: vars.ENGAGE_VERIFY_TOKEN,
      sourceSecret: vars.ENGAGE_SOURCE_SECRET,
      botCategoryId: vars.ENGAGE_BOT_CATEGORY_ID,
      agentCategoryId: vars.ENGAGE_AGENT_CATEGORY_ID,
    },
    webhookPath: vars.ENGAGE_WEBHOOK_PATH,
    handoff: {
      agentKeywords: vars.HANDOFF_AGENT_KEYWORDS ?? DEFAULT_HANDOFF_RECOGNIZER_CONFIG.agentKeywords,
      botKeywords: vars.HANDOFF_BOT_KEYWORDS ?? DEFAULT_HANDOFF_RECOGNIZER_CONFIG.botKeywords,
    },
  };
}

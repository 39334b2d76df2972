/**
 * Zod schemas for validating the process environment.
 * Every setting the adapter reads comes through here.
 */
import { z } from 'zod';

// ─── Helpers ────────────────────────────────────────────────────

/** Comma-separated list → trimmed, non-empty entries. */
const keywordListSchema = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0),
  );

// ─── Server Config ──────────────────────────────────────────────

/**
 * Schema for HTTP server settings.
 */
export const serverConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65_535).default(3978),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('production'),
});

// ─── Engage Config ──────────────────────────────────────────────

/**
 * Schema for the Engage platform connection and handoff categories.
 */
export const engageConfigSchema = z.object({
  ENGAGE_API_URL: z.string().url('ENGAGE_API_URL must be a valid URL'),
  ENGAGE_ACCESS_TOKEN: z.string().min(1, 'ENGAGE_ACCESS_TOKEN cannot be empty'),
  ENGAGE_VERIFY_TOKEN: z.string().min(1, 'ENGAGE_VERIFY_TOKEN cannot be empty'),
  ENGAGE_SOURCE_SECRET: z.string().min(1).optional(),
  ENGAGE_BOT_CATEGORY_ID: z.string().min(1, 'ENGAGE_BOT_CATEGORY_ID cannot be empty'),
  ENGAGE_AGENT_CATEGORY_ID: z.string().min(1, 'ENGAGE_AGENT_CATEGORY_ID cannot be empty'),
  ENGAGE_WEBHOOK_PATH: z.string().startsWith('/').default('/api/engage'),
});

// ─── Handoff Config ─────────────────────────────────────────────

export const handoffEnvSchema = z.object({
  HANDOFF_AGENT_KEYWORDS: keywordListSchema.optional(),
  HANDOFF_BOT_KEYWORDS: keywordListSchema.optional(),
});

// ─── Full Environment ───────────────────────────────────────────

export const envSchema = serverConfigSchema.merge(engageConfigSchema).merge(handoffEnvSchema);

// ─── Types ──────────────────────────────────────────────────────
export type { AppConfig, EngageConfig } from './types.js';

// ─── Schemas ────────────────────────────────────────────────────
export { engageConfigSchema, envSchema, handoffEnvSchema, serverConfigSchema } from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export { ConfigError, loadConfig } from './loader.js';

import type { HandoffRecognizerConfig } from '@/handoff/recognizer.js';

// ─── Application Configuration ──────────────────────────────────

/** Engage REST API and webhook settings. */
export interface EngageConfig {
  /** API root, e.g. https://acme.api.engagement.dimelo.com/1.0 */
  apiUrl: string;
  accessToken: string;
  /** Token the platform echoes back during the hub.mode handshake. */
  verifyToken: string;
  /** Shared secret for custom source SDK signatures; unsigned calls are accepted when unset. */
  sourceSecret?: string;
  /** Thread category marking bot-controlled threads. */
  botCategoryId: string;
  /** Thread category marking agent-controlled threads. */
  agentCategoryId: string;
}

/**
 * Full adapter configuration, resolved from the environment.
 */
export interface AppConfig {
  server: {
    port: number;
    host: string;
    logLevel: string;
    environment: 'development' | 'test' | 'production';
  };
  engage: EngageConfig;
  webhookPath: string;
  handoff: HandoffRecognizerConfig;
}

// ─── Logging ────────────────────────────────────────────────────

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  threadId?: string;
  activityId?: string;
  component: string;
  [key: string]: unknown;
}

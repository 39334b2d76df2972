import type { Activity } from '@/activities/types.js';

// ─── HTTP Abstractions ──────────────────────────────────────────
// The adapter never sees the HTTP framework; routes wrap their
// request/reply into these.

export interface WebhookRequest {
  readonly method: string;
  /** Request path and query string. */
  readonly url: string;
  readonly query: Readonly<Record<string, unknown>>;
  readonly headers: Readonly<Record<string, string | string[] | undefined>>;
  /** Parsed JSON body; undefined when the body is empty or not JSON. */
  readonly body: unknown;
  /** Body exactly as received, for signature checks. */
  readonly rawBody?: string;
}

export interface WebhookResponse {
  /** True once a status and payload were written. */
  readonly sent: boolean;
  send(statusCode: number, payload?: unknown): void;
}

// ─── Event Classification ───────────────────────────────────────

/** Events that may carry an activity for the bot. */
type ActivityEventKind = 'intervention' | 'action' | 'contentImported';

export type ClassifiedEvent =
  | { readonly kind: 'verifyWebhook' }
  | { readonly kind: ActivityEventKind; readonly activity: Activity | null }
  | { readonly kind: 'unknown'; readonly reason: string };

/** What the platform client can produce from a payload; verification is decided before it. */
export type PlatformEvent = Exclude<ClassifiedEvent, { readonly kind: 'verifyWebhook' }>;

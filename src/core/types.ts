// ─── Branded ID Types ────────────────────────────────────────────
// Branded types prevent accidentally passing a SourceId where a ThreadId is expected.

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

/** Conversation thread on the engagement platform. */
export type ThreadId = Brand<string, 'ThreadId'>;
/** Channel (source) a piece of content was imported from. */
export type SourceId = Brand<string, 'SourceId'>;
/** Single piece of content (message) on the platform. */
export type ContentId = Brand<string, 'ContentId'>;

// ─── Conversation Control ───────────────────────────────────────

/** Who currently answers a thread on the platform. */
export type ThreadController = 'bot' | 'agent' | 'unknown';

/** A conversation thread as returned by the platform API. */
export interface Thread {
  id: ThreadId;
  sourceId?: SourceId;
  title?: string;
  /** Thread category ids; the controller is derived from them. */
  categoryIds: string[];
  controller: ThreadController;
}

import type { Activity, ResourceResponse } from '@/activities/types.js';

// ─── Bot ────────────────────────────────────────────────────────

/** The bot's turn handler. Owns its own state; the adapter only feeds it activities. */
export interface Bot {
  onTurn(context: TurnContext, signal?: AbortSignal): Promise<void>;
}

/** Reference to a previously sent activity. */
export interface ActivityReference {
  activityId?: string;
  conversationId?: string;
}

// ─── Adapter ────────────────────────────────────────────────────

/** Outbound half of a channel adapter, used by TurnContext. */
export interface BotAdapter {
  sendActivities(context: TurnContext, activities: Activity[]): Promise<ResourceResponse[]>;
  updateActivity(context: TurnContext, activity: Activity): Promise<ResourceResponse>;
  deleteActivity(context: TurnContext, reference: ActivityReference): Promise<void>;
}

// ─── Turn Context ───────────────────────────────────────────────

export interface TurnContext {
  readonly adapter: BotAdapter;
  /** The inbound activity for this turn. */
  readonly activity: Activity;
  /** True once at least one outbound activity produced a response. */
  readonly responded: boolean;
  sendActivity(activityOrText: Partial<Activity> | string): Promise<ResourceResponse | undefined>;
  sendActivities(activities: Partial<Activity>[]): Promise<ResourceResponse[]>;
  updateActivity(activity: Activity): Promise<ResourceResponse>;
  deleteActivity(activityId: string): Promise<void>;
}

/** Called with errors the bot throws during a turn. */
export type TurnErrorHandler = (context: TurnContext, error: unknown) => Promise<void>;

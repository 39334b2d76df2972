// ─── Activity Types ─────────────────────────────────────────────

export const ActivityTypes = {
  Message: 'message',
  Typing: 'typing',
  Event: 'event',
  EndOfConversation: 'endOfConversation',
} as const;

export type ActivityType = (typeof ActivityTypes)[keyof typeof ActivityTypes];

/** Channel id stamped on every activity produced by this adapter. */
export const ENGAGE_CHANNEL_ID = 'engage';

// ─── Accounts ───────────────────────────────────────────────────

export interface ChannelAccount {
  id: string;
  name?: string;
  role?: 'user' | 'bot' | 'agent';
}

/** The conversation an activity belongs to. On Engage this is the thread. */
export interface ConversationAccount {
  id: string;
  name?: string;
}

// ─── Activity ───────────────────────────────────────────────────

/** Normalized unit of conversational content exchanged with the bot. */
export interface Activity {
  id?: string;
  type: ActivityType;
  channelId?: string;
  timestamp?: Date;
  from?: ChannelAccount;
  recipient?: ChannelAccount;
  conversation?: ConversationAccount;
  text?: string;
  /** Event name, for `event` activities. */
  name?: string;
  value?: unknown;
  replyToId?: string;
  /** Platform-specific payload; see EngageChannelData. */
  channelData?: unknown;
}

/** Acknowledgment of a successful outbound send. */
export interface ResourceResponse {
  id: string;
}

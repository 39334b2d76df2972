import { nanoid } from 'nanoid';
import { ENGAGE_CHANNEL_ID } from './types.js';
import type { Activity } from './types.js';

/** Build an activity, filling id, channel and timestamp when absent. */
export function createActivity(activity: Activity): Activity {
  return {
    ...activity,
    id: activity.id ?? nanoid(),
    channelId: activity.channelId ?? ENGAGE_CHANNEL_ID,
    timestamp: activity.timestamp ?? new Date(),
  };
}

/**
 * Engage channel data: correlates an activity with the thread and
 * source it came from on the platform.
 */
import { z } from 'zod';
import { ValidationError } from '@/core/errors.js';
import type { SourceId, ThreadId } from '@/core/types.js';
import type { Activity } from './types.js';

// ─── Schema ─────────────────────────────────────────────────────

export const engageChannelDataSchema = z.object({
  sourceId: z.string().min(1),
  threadId: z.string().min(1).optional(),
});

export interface EngageChannelData {
  sourceId: SourceId;
  threadId?: ThreadId;
}

// ─── Accessors ──────────────────────────────────────────────────

/**
 * Read Engage channel data from an activity.
 * Returns null when it is missing or malformed; never throws.
 */
export function tryGetChannelData(activity: Activity): EngageChannelData | null {
  const parsed = engageChannelDataSchema.safeParse(activity.channelData);
  if (!parsed.success) return null;

  const { sourceId, threadId } = parsed.data;
  return {
    sourceId: sourceId as SourceId,
    ...(threadId !== undefined && { threadId: threadId as ThreadId }),
  };
}

/**
 * Read Engage channel data that an earlier step already guaranteed.
 * @throws ValidationError when it is missing.
 */
export function getChannelData(activity: Activity): EngageChannelData {
  const channelData = tryGetChannelData(activity);
  if (!channelData) {
    throw new ValidationError('Activity is missing Engage channel data', {
      activityId: activity.id,
      activityType: activity.type,
    });
  }
  return channelData;
}

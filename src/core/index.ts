// Core module: shared ids and the error hierarchy
export type {
  ContentId,
  SourceId,
  Thread,
  ThreadController,
  ThreadId,
} from './types.js';

export {
  EngageBridgeError,
  NotSupportedError,
  PlatformApiError,
  ValidationError,
} from './errors.js';

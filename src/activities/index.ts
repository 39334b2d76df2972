export * from './types.js';

export { createActivity } from './factory.js';
export { engageChannelDataSchema, getChannelData, tryGetChannelData } from './channel-data.js';
export type { EngageChannelData } from './channel-data.js';

export type { EngageClient } from './types.js';

export { createEngageClient, queryValue } from './client.js';
export type { EngageClientDeps } from './client.js';

export { IMPLEMENTATION_INFO, parseSourceSdkCall, parseWebhookDelivery } from './event-parser.js';
export { computeSourceSignature, isValidSourceSignature } from './signature.js';
export * from './payloads.js';

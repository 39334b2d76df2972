export * from './types.js';

export { createEngageAdapter } from './engage-adapter.js';
export type { EngageAdapter, EngageAdapterDeps } from './engage-adapter.js';

export { createEventClassifier, VERIFY_WEBHOOK_QUERY_KEY } from './event-classifier.js';
export type { EventClassifier, EventClassifierDeps } from './event-classifier.js';

export type { ApiError, ApiResponse, RouteDependencies } from './types.js';
export { registerErrorHandler, sendError } from './error-handler.js';
export { registerRoutes } from './routes/index.js';
export { engageWebhookRoutes, toWebhookRequest, toWebhookResponse } from './routes/engage-webhook.js';
export { createServer } from './server.js';

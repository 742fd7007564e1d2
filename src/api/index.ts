// OpenAI-compatible HTTP surface (Fastify)
export type { ApiError, ApiErrorBody, RouteDependencies } from './types.js';

export { registerErrorHandler, sendError, sendNotFound, errorTypeFor } from './error-handler.js';
export { registerOperationalRoutes, registerRoutes } from './routes/index.js';

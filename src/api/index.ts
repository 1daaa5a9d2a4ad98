// REST endpoints (Fastify)
export type {
  ApiError,
  ApiResponse,
  QueryRequest,
  QueryResponse,
  RouteDependencies,
} from './types.js';

export type { DescribedError } from './error-handler.js';
export { describeError, registerErrorHandler, sendSuccess, sendError, sendNotFound } from './error-handler.js';
export { registerRoutes } from './routes/index.js';

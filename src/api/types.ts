import type { MultiAgentManager } from '@/manager/multi-agent-manager.js';
import type { Logger } from '@/observability/logger.js';

// ─── API Response Envelope ───────────────────────────────────────

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

// ─── Query Request/Response ─────────────────────────────────────

export interface QueryRequest {
  userId: string;
  query: string;
  context?: Record<string, unknown>;
}

export interface QueryResponse {
  userId: string;
  response: string;
}

// ─── Route Dependencies (DI) ───────────────────────────────────

/** Dependencies injected into all route plugins via Fastify register options. */
export interface RouteDependencies {
  manager: MultiAgentManager;
  logger: Logger;
}

/**
 * Status routes — read-only views of agents, statistics and bus traffic.
 */
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { MESSAGE_TYPES } from '@/messaging/types.js';
import type { RouteDependencies } from '../types.js';
import { sendNotFound, sendSuccess } from '../error-handler.js';

const messageHistoryQuerySchema = z.object({
  handlerId: z.string().min(1).optional(),
  type: z.enum(MESSAGE_TYPES).optional(),
  limit: z.coerce.number().int().positive().max(1000).default(100),
});

// ─── Route Plugin ───────────────────────────────────────────────

/** Register health, status, agent, metrics and message history routes. */
export function statusRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): void {
  const { manager } = deps;

  fastify.get('/health', async (_request, reply) => {
    return sendSuccess(reply, { status: manager.isRunning() ? 'ok' : 'stopped' });
  });

  fastify.get('/status', async (_request, reply) => {
    return sendSuccess(reply, manager.getSystemStatus());
  });

  fastify.get('/agents', async (_request, reply) => {
    return sendSuccess(reply, manager.getAllAgentsStatus());
  });

  fastify.get<{ Params: { agentId: string } }>('/agents/:agentId', async (request, reply) => {
    const status = manager.getAgentStatus(request.params.agentId);
    if (!status) return sendNotFound(reply, 'Agent', request.params.agentId);
    return sendSuccess(reply, status);
  });

  fastify.get('/capabilities', async (_request, reply) => {
    return sendSuccess(reply, manager.getAvailableCapabilities());
  });

  fastify.get('/metrics', async (_request, reply) => {
    return sendSuccess(reply, manager.getPerformanceMetrics());
  });

  // GET /messages?handlerId=&type=&limit=
  fastify.get('/messages', async (request, reply) => {
    const filter = messageHistoryQuerySchema.parse(request.query);
    return sendSuccess(reply, manager.getMessageHistory(filter));
  });
}

/**
 * Query route — hands a user query to the multi-agent system.
 */
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { QueryResponse, RouteDependencies } from '../types.js';
import { sendError, sendSuccess } from '../error-handler.js';

export const queryRequestSchema = z.object({
  userId: z.string().min(1).max(200).default('anonymous'),
  query: z.string().trim().min(1, 'Query cannot be empty').max(100_000),
  context: z.record(z.unknown()).optional(),
});

// ─── Route Plugin ───────────────────────────────────────────────

/** Register the POST /query route. */
export function queryRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): void {
  const { manager, logger } = deps;

  fastify.post('/query', async (request, reply) => {
    const body = queryRequestSchema.parse(request.body);

    if (!manager.isRunning()) {
      return sendError(reply, 'NOT_RUNNING', 'Multi-agent system is not running', 503);
    }

    const response = await manager.processUserQuery(body.userId, body.query, body.context);
    logger.debug('Query answered', {
      component: 'query-route',
      userId: body.userId,
      responseLength: response.length,
    });

    const result: QueryResponse = { userId: body.userId, response };
    return sendSuccess(reply, result);
  });
}

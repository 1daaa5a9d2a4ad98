/**
 * HTTP error mapping for the orchestration API.
 *
 * `describeError` turns anything a route throws into a status and an
 * `ApiError`; `registerErrorHandler` sends it in the response envelope.
 * Non-operational OrchestratorErrors are hidden like unknown errors.
 */
import type { FastifyInstance, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { OrchestratorError, errorMessage } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';
import type { ApiError, ApiResponse } from './types.js';

export const INTERNAL_ERROR: ApiError = {
  code: 'INTERNAL_ERROR',
  message: 'An unexpected error occurred',
};

export interface DescribedError {
  statusCode: number;
  error: ApiError;
  /** Whether the failure points at the server rather than the request. */
  unexpected: boolean;
}

// ─── Envelope ────────────────────────────────────────────────────

export async function sendSuccess(reply: FastifyReply, data: unknown, statusCode = 200): Promise<void> {
  const body: ApiResponse<unknown> = { success: true, data };
  await reply.status(statusCode).send(body);
}

export async function sendError(
  reply: FastifyReply,
  code: string,
  message: string,
  statusCode = 500,
  details?: Record<string, unknown>,
): Promise<void> {
  const error: ApiError = details ? { code, message, details } : { code, message };
  const body: ApiResponse<never> = { success: false, error };
  await reply.status(statusCode).send(body);
}

export async function sendNotFound(reply: FastifyReply, resource: string, id: string): Promise<void> {
  await sendError(reply, 'NOT_FOUND', `${resource} "${id}" not found`, 404);
}

// ─── Mapping ─────────────────────────────────────────────────────

/** Status carried by framework errors such as malformed JSON bodies. */
function requestStatusOf(error: unknown): number | undefined {
  if (!(error instanceof Error) || !('statusCode' in error)) return undefined;
  const { statusCode } = error;
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500 ? statusCode : undefined;
}

export function describeError(error: unknown): DescribedError {
  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      unexpected: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Request validation failed',
        details: {
          issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
        },
      },
    };
  }

  if (error instanceof OrchestratorError) {
    if (!error.isOperational) {
      return { statusCode: 500, unexpected: true, error: INTERNAL_ERROR };
    }
    const described: ApiError = error.context
      ? { code: error.code, message: error.message, details: error.context }
      : { code: error.code, message: error.message };
    return { statusCode: error.statusCode, unexpected: error.statusCode >= 500, error: described };
  }

  const requestStatus = requestStatusOf(error);
  if (requestStatus !== undefined) {
    return {
      statusCode: requestStatus,
      unexpected: false,
      error: { code: 'REQUEST_ERROR', message: errorMessage(error) },
    };
  }

  return { statusCode: 500, unexpected: true, error: INTERNAL_ERROR };
}

// ─── Handler ─────────────────────────────────────────────────────

export function registerErrorHandler(fastify: FastifyInstance, logger: Logger): void {
  fastify.setErrorHandler(async (error, request, reply) => {
    const { statusCode, error: apiError, unexpected } = describeError(error);

    const context = {
      component: 'api',
      method: request.method,
      url: request.url,
      statusCode,
      code: apiError.code,
      error: errorMessage(error),
    };
    if (unexpected) {
      logger.error('Request failed', {
        ...context,
        stack: error instanceof Error ? error.stack : undefined,
      });
    } else {
      logger.warn('Request rejected', context);
    }

    await sendError(reply, apiError.code, apiError.message, statusCode, apiError.details);
  });
}

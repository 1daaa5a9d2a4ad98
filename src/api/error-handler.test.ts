import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  NoAgentsAvailableError,
  OrchestratorError,
  ProviderError,
  ToolNotFoundError,
} from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';
import { describeError, registerErrorHandler, sendError, sendNotFound, sendSuccess } from './error-handler.js';

interface ErrorBody {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

function zodFailure(): unknown {
  try {
    z.object({ query: z.string() }).parse({ query: 42 });
  } catch (error) {
    return error;
  }
  throw new Error('expected a ZodError');
}

// ─── describeError ───────────────────────────────────────────────

describe('describeError', () => {
  it('lists zod issues with dotted paths', () => {
    expect(describeError(zodFailure())).toEqual({
      statusCode: 400,
      unexpected: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Request validation failed',
        details: { issues: [{ path: 'query', message: 'Expected string, received number' }] },
      },
    });
  });

  it('uses the code, status and context of operational errors', () => {
    expect(describeError(new NoAgentsAvailableError(['math']))).toEqual({
      statusCode: 503,
      unexpected: true,
      error: {
        code: 'NO_AGENTS_AVAILABLE',
        message: 'No agents available with required capabilities',
        details: { requiredCapabilities: ['math'] },
      },
    });
  });

  it('treats client-side orchestrator errors as expected', () => {
    const described = describeError(new ToolNotFoundError('weather'));

    expect(described.statusCode).toBe(404);
    expect(described.unexpected).toBe(false);
    expect(described.error.code).toBe('TOOL_NOT_FOUND');
  });

  it('omits details when the error has no context', () => {
    const described = describeError(new OrchestratorError({ message: 'Teapot', code: 'TEAPOT', statusCode: 418 }));

    expect(described.error).toEqual({ code: 'TEAPOT', message: 'Teapot' });
  });

  it('hides non-operational errors', () => {
    const bug = new OrchestratorError({ message: 'registry corrupted', code: 'BUG', isOperational: false });

    expect(describeError(bug)).toEqual({
      statusCode: 500,
      unexpected: true,
      error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
    });
  });

  it('passes through 4xx statuses from framework errors', () => {
    const described = describeError(Object.assign(new Error('Not Acceptable'), { statusCode: 406 }));

    expect(described).toEqual({
      statusCode: 406,
      unexpected: false,
      error: { code: 'REQUEST_ERROR', message: 'Not Acceptable' },
    });
  });

  it('does not trust 5xx statuses on unknown errors', () => {
    const described = describeError(Object.assign(new Error('socket hang up'), { statusCode: 503 }));

    expect(described.statusCode).toBe(500);
    expect(described.error.code).toBe('INTERNAL_ERROR');
  });

  it('falls back to a generic 500 for anything else', () => {
    expect(describeError('kaboom').error).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    });
  });
});

// ─── Envelope Helpers ────────────────────────────────────────────

describe('envelope helpers', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = Fastify();
    app.get('/ok', async (_request, reply) => sendSuccess(reply, { foo: 'bar' }));
    app.get('/created', async (_request, reply) => sendSuccess(reply, { created: true }, 201));
    app.get('/fail', async (_request, reply) => sendError(reply, 'TEST_ERROR', 'Something went wrong'));
    app.get('/fail-details', async (_request, reply) =>
      sendError(reply, 'DETAIL_ERROR', 'With details', 422, { field: 'query' }),
    );
    app.get('/missing', async (_request, reply) => sendNotFound(reply, 'Agent', 'agent-9'));
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('wraps data in a success envelope', async () => {
    const response = await app.inject({ method: 'GET', url: '/ok' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ success: true, data: { foo: 'bar' } });
  });

  it('uses a custom success status', async () => {
    const response = await app.inject({ method: 'GET', url: '/created' });

    expect(response.statusCode).toBe(201);
  });

  it('defaults errors to 500 without details', async () => {
    const response = await app.inject({ method: 'GET', url: '/fail' });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({
      success: false,
      error: { code: 'TEST_ERROR', message: 'Something went wrong' },
    });
  });

  it('includes details when given', async () => {
    const response = await app.inject({ method: 'GET', url: '/fail-details' });

    expect(response.statusCode).toBe(422);
    expect(response.json<ErrorBody>().error.details).toEqual({ field: 'query' });
  });

  it('describes missing resources', async () => {
    const response = await app.inject({ method: 'GET', url: '/missing' });

    expect(response.statusCode).toBe(404);
    expect(response.json<ErrorBody>().error).toEqual({ code: 'NOT_FOUND', message: 'Agent "agent-9" not found' });
  });
});

// ─── registerErrorHandler ────────────────────────────────────────

describe('registerErrorHandler', () => {
  let app: FastifyInstance;
  let logger: Logger;

  beforeAll(async () => {
    logger = createMockLogger();
    app = Fastify();
    registerErrorHandler(app, logger);

    app.get('/tool', () => {
      throw new ToolNotFoundError('weather');
    });
    app.get('/provider', () => {
      throw new ProviderError('openai', 'rate limited');
    });
    app.get('/unknown', () => {
      throw new Error('kaboom');
    });

    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('sends the described error and logs request failures as warnings', async () => {
    const response = await app.inject({ method: 'GET', url: '/tool' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      success: false,
      error: { code: 'TOOL_NOT_FOUND', message: 'Tool "weather" not found', details: { toolName: 'weather' } },
    });
    expect(logger.warn).toHaveBeenCalledWith(
      'Request rejected',
      expect.objectContaining({ component: 'api', method: 'GET', url: '/tool', statusCode: 404 }),
    );
  });

  it('logs server-side failures as errors', async () => {
    const response = await app.inject({ method: 'GET', url: '/provider' });

    expect(response.statusCode).toBe(502);
    expect(response.json<ErrorBody>().error.message).toBe('Model backend "openai" error: rate limited');
    expect(logger.error).toHaveBeenCalledWith(
      'Request failed',
      expect.objectContaining({ url: '/provider', code: 'PROVIDER_ERROR' }),
    );
  });

  it('hides unexpected errors but logs the original message', async () => {
    const response = await app.inject({ method: 'GET', url: '/unknown' });

    expect(response.statusCode).toBe(500);
    expect(response.json<ErrorBody>().error).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    });
    expect(logger.error).toHaveBeenCalledWith(
      'Request failed',
      expect.objectContaining({ url: '/unknown', error: 'kaboom' }),
    );
  });
});

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { registerErrorHandler } from '../error-handler.js';
import { statusRoutes } from './status.js';
import { orchestratorConfigSchema } from '@/config/schema.js';
import { createMultiAgentManager } from '@/manager/multi-agent-manager.js';
import type { MultiAgentManager } from '@/manager/multi-agent-manager.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';

interface Envelope<T> {
  success: boolean;
  data: T;
  error?: { code: string; message: string };
}

describe('statusRoutes', () => {
  let app: FastifyInstance;
  let manager: MultiAgentManager;

  beforeAll(async () => {
    const logger = createMockLogger();
    manager = createMultiAgentManager({
      config: orchestratorConfigSchema.parse({ bus: { pollIntervalMs: 10 } }),
      logger,
    });
    await manager.start();
    await manager.processUserQuery('user-1', 'Calculate 2 + 2');

    app = Fastify();
    registerErrorHandler(app, logger);
    statusRoutes(app, { manager, logger });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
    await manager.shutdown();
  });

  it('reports health', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.json<Envelope<{ status: string }>>().data).toEqual({ status: 'ok' });
  });

  it('reports system status', async () => {
    const response = await app.inject({ method: 'GET', url: '/status' });
    const data = response.json<Envelope<Record<string, unknown>>>().data;

    expect(data).toMatchObject({ isInitialized: true, isRunning: true, totalAgents: 2, activeAgents: 2 });
  });

  it('lists agents by id', async () => {
    const response = await app.inject({ method: 'GET', url: '/agents' });

    expect(Object.keys(response.json<Envelope<Record<string, unknown>>>().data)).toEqual([
      'coordinator_001',
      'tool_executor_001',
    ]);
  });

  it('returns a single agent', async () => {
    const response = await app.inject({ method: 'GET', url: '/agents/tool_executor_001' });
    const data = response.json<Envelope<{ name: string; state: string }>>().data;

    expect(data.name).toBe('ToolExecutor');
    expect(data.state).toBe('active');
  });

  it('returns 404 for an unknown agent', async () => {
    const response = await app.inject({ method: 'GET', url: '/agents/ghost' });

    expect(response.statusCode).toBe(404);
    expect(response.json<Envelope<unknown>>().error).toEqual({
      code: 'NOT_FOUND',
      message: 'Agent "ghost" not found',
    });
  });

  it('reports query metrics', async () => {
    const response = await app.inject({ method: 'GET', url: '/metrics' });

    expect(response.json<Envelope<Record<string, unknown>>>().data).toMatchObject({
      totalQueries: 1,
      successfulQueries: 1,
      failedQueries: 0,
      successRatePercent: 100,
    });
  });

  it('filters message history', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/messages?type=agent_request&limit=5',
    });
    const data = response.json<Envelope<{ type: string; senderId: string }[]>>().data;

    expect(data).toHaveLength(1);
    expect(data[0]).toMatchObject({ type: 'agent_request', senderId: 'coordinator_001' });
  });

  it('rejects an unknown message type', async () => {
    const response = await app.inject({ method: 'GET', url: '/messages?type=bogus' });

    expect(response.statusCode).toBe(400);
  });
});

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ToolExecutorAgent, synthesizeToolResults } from './tool-executor-agent.js';
import { createMessageBus } from '@/messaging/message-bus.js';
import { createAgentRequestMessage, createToolRequestMessage } from '@/messaging/message-factory.js';
import type { MessageBus } from '@/messaging/types.js';
import type { Logger } from '@/observability/logger.js';
import { createMathTool } from '@/tools/definitions/math.js';
import { createToolRegistry } from '@/tools/registry/tool-registry.js';
import type { ToolRegistry } from '@/tools/registry/tool-registry.js';
import type { ToolProvider } from '@/tools/types.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';
import {
  createEchoTool,
  createFailingTool,
  createSlowTool,
  createThrowingTool,
} from '@/testing/fixtures/tools.js';

describe('ToolExecutorAgent', () => {
  let logger: Logger;
  let bus: MessageBus;
  let registry: ToolRegistry;
  let slowTool: ReturnType<typeof createSlowTool>;
  let agent: ToolExecutorAgent;

  beforeEach(async () => {
    logger = createMockLogger();
    bus = createMessageBus({ logger, pollIntervalMs: 10 });
    bus.start();

    registry = createToolRegistry({ logger });
    slowTool = createSlowTool(1000);
    registry.register(createMathTool());
    registry.register(createEchoTool());
    registry.register(slowTool);
    registry.register(createFailingTool());
    registry.register(createThrowingTool());

    agent = new ToolExecutorAgent({ bus, logger, toolProvider: registry, defaultToolTimeoutMs: 5000 });
    await agent.initialize();
  });

  afterEach(async () => {
    await agent.stop();
    await bus.stop();
  });

  it('uses the default identity', () => {
    expect(agent.agentId).toBe('tool_executor_001');
    expect(agent.name).toBe('ToolExecutor');
    expect(agent.getProfile().capabilities).toEqual([
      'tool_calling',
      'code_execution',
      'math',
      'search',
      'weather',
    ]);
  });

  it('caches the provider tool list on initialize', () => {
    expect(agent.getAvailableTools()).toEqual(['math', 'echo', 'slow', 'failing', 'throwing']);
    expect(agent.getToolInfo('math')?.category).toBe('math');
    expect(agent.getToolInfo('missing')).toBeUndefined();
  });

  describe('executeTool', () => {
    it('returns the tool output and records the run', async () => {
      const result = await agent.executeTool('math', { expression: '15 * 23' });

      expect(result.success).toBe(true);
      expect(result.result).toEqual({ expression: '15 * 23', result: 345 });
      expect(agent.getToolStats('math')).toMatchObject({
        totalExecutions: 1,
        successfulExecutions: 1,
        failedExecutions: 0,
      });
      expect(agent.getExecutionLog().map((entry) => entry.step)).toEqual([
        'start',
        'tool_found',
        'execution_start',
        'execution_success',
      ]);
      expect(agent.getExecutionLog()[3]?.payload['result']).toBe('{"expression":"15 * 23","result":345}');
    });

    it('reports unknown tools without invoking anything', async () => {
      const result = await agent.executeTool('nope', {});

      expect(result).toMatchObject({
        toolName: 'nope',
        success: false,
        errorKind: 'ToolNotFound',
        error: 'Tool "nope" not found',
      });
      expect(agent.getToolStats('nope')?.failedExecutions).toBe(1);
      expect(agent.getExecutionLog().map((entry) => entry.step)).toEqual(['start', 'tool_not_found']);
    });

    it('aborts a tool that exceeds its timeout', async () => {
      const result = await agent.executeTool('slow', {}, 100);

      expect(result).toMatchObject({
        success: false,
        errorKind: 'ToolTimeout',
        error: 'Tool "slow" timed out after 100ms',
      });
      expect(result.executionTimeMs).toBeLessThan(1000);
      await vi.waitFor(() => {
        expect(slowTool.abortedCalls).toBe(1);
      });
      expect(agent.getExecutionLog().at(-1)?.step).toBe('execution_timeout');
    });

    it('counts a timed-out call as failed, including the time it took', async () => {
      await agent.executeTool('slow', {}, 100);

      const stats = agent.getToolStats('slow');
      expect(stats).toMatchObject({ totalExecutions: 1, successfulExecutions: 0, failedExecutions: 1 });
      // timers may fire a few ms early against Date.now
      expect(stats?.averageExecutionTimeMs).toBeGreaterThanOrEqual(95);
      expect(stats?.averageExecutionTimeMs).toBeLessThan(1000);
      expect(stats?.totalExecutions).toBe((stats?.successfulExecutions ?? 0) + (stats?.failedExecutions ?? 0));
    });

    it('truncates logged parameters', async () => {
      await agent.executeTool('math', { expression: 'y'.repeat(50_000) });

      const start = agent.getExecutionLog().find((entry) => entry.step === 'start');
      expect(start?.payload['parameters']).toBe('{"expression":"' + 'y'.repeat(485));
    });

    it('truncates logged error text', async () => {
      registry.register(createFailingTool('x'.repeat(2000), 'verbose'));

      const result = await agent.executeTool('verbose', {});

      const logged = agent.getExecutionLog().at(-1);
      expect(logged?.step).toBe('execution_error');
      expect(logged?.payload['error']).toBe('Tool "verbose" execution failed: ' + 'x'.repeat(467));
      expect(result.error).toHaveLength(2033);
    });

    it('reports a provider that throws while resolving', async () => {
      const broken: ToolProvider = {
        listTools: () => Promise.resolve([]),
        resolve: () => {
          throw new Error('catalog offline');
        },
        invoke: () => Promise.resolve(undefined),
      };
      const isolated = new ToolExecutorAgent({ agentId: 'tool_executor_003', bus, logger, toolProvider: broken });

      const result = await isolated.executeTool('math', { expression: '1 + 1' });

      expect(result).toMatchObject({
        success: false,
        errorKind: 'ToolExecutionError',
        error: 'Tool "math" execution failed: catalog offline',
      });
      expect(isolated.getExecutionLog().map((entry) => entry.step)).toEqual(['start', 'execution_error']);
      expect(isolated.getToolStats('math')?.failedExecutions).toBe(1);
    });

    it('reports failures returned by the tool', async () => {
      const result = await agent.executeTool('failing', {});

      expect(result).toMatchObject({
        success: false,
        errorKind: 'ToolExecutionError',
        error: 'Tool "failing" execution failed: boom',
      });
    });

    it('reports errors thrown by the tool', async () => {
      const result = await agent.executeTool('throwing', {});

      expect(result.error).toBe('Tool "throwing" execution failed: unexpected');
      expect(result.errorKind).toBe('ToolExecutionError');
    });

    it('reports invalid parameters as an execution error', async () => {
      const result = await agent.executeTool('math', {});

      expect(result.error).toBe('Tool "math" execution failed: Invalid input for tool "math"');
    });

    it('counts every outcome in the stats', async () => {
      await agent.executeTool('math', { expression: '1 + 1' });
      await agent.executeTool('math', { expression: '1 / 0' });

      const stats = agent.getToolStats('math');
      expect(stats?.totalExecutions).toBe(2);
      expect(stats?.successfulExecutions).toBe(1);
      expect(stats?.failedExecutions).toBe(1);
    });
  });

  describe('agent requests', () => {
    it('runs the inferred tool and summarises its output', async () => {
      const request = createAgentRequestMessage({
        senderId: 'coordinator_001',
        recipientId: agent.agentId,
        requestedCapability: 'general_assistance',
        taskDescription: 'Calculate 15 * 23',
      });

      const reply = await agent.processMessage(request);

      expect(reply?.type).toBe('agent_response');
      expect(reply?.content).toBe('Tool execution results:\n- math: {"expression":"15 * 23","result":345}');
      expect(reply?.parentMessageId).toBe(request.id);
      if (reply?.type === 'agent_response') {
        expect(reply.payload.toolsUsed).toEqual(['math']);
        expect(reply.payload.confidence).toBe(0.9);
      }
    });

    it('answers directly when no tool applies', async () => {
      const reply = await agent.processMessage(
        createAgentRequestMessage({
          senderId: 'coordinator_001',
          requestedCapability: 'general_assistance',
          taskDescription: 'hello there',
        }),
      );

      expect(reply?.content).toBe('No tools required for this task');
      if (reply?.type === 'agent_response') expect(reply.payload.confidence).toBe(1);
    });

    it('lists successes and failures for explicit tools', async () => {
      const reply = await agent.processMessage(
        createAgentRequestMessage({
          senderId: 'coordinator_001',
          requestedCapability: 'math',
          taskDescription: 'Calculate 2 + 2',
          requiredTools: ['math', 'failing', 'missing'],
        }),
      );

      expect(reply?.content).toBe(
        'Tool execution results:\n- math: {"expression":"2 + 2","result":4}' +
          '\n\nFailed tool executions:\n- failing: Tool "failing" execution failed: boom',
      );
      if (reply?.type === 'agent_response') expect(reply.payload.toolsUsed).toEqual(['math']);
    });
  });

  describe('tool requests', () => {
    it('replies with a tool result', async () => {
      const request = createToolRequestMessage({
        senderId: 'coordinator_001',
        recipientId: agent.agentId,
        toolName: 'math',
        parameters: { expression: '2*3' },
      });

      const reply = await agent.processMessage(request);

      expect(reply?.type).toBe('tool_result');
      expect(reply?.content).toBe('{"expression":"2*3","result":6}');
      if (reply?.type === 'tool_result') {
        expect(reply.payload.success).toBe(true);
        expect(reply.payload.result).toEqual({ expression: '2*3', result: 6 });
      }
    });

    it('honours the requested timeout', async () => {
      const reply = await agent.processMessage(
        createToolRequestMessage({ senderId: 'coordinator_001', toolName: 'slow', timeoutMs: 20 }),
      );

      expect(reply?.content).toBe('Tool execution failed: Tool "slow" timed out after 20ms');
    });
  });

  describe('tool inventory', () => {
    it('reports added and removed tools on refresh', async () => {
      registry.register(createFailingTool('nope', 'extra'));
      registry.unregister('echo');

      expect(await agent.refreshAvailableTools()).toEqual({ added: ['extra'], removed: ['echo'] });
      expect(agent.getAvailableTools()).toContain('extra');
    });

    it('refreshes periodically while running', async () => {
      const periodic = new ToolExecutorAgent({
        agentId: 'tool_executor_002',
        bus,
        logger,
        toolProvider: registry,
        toolHealthCheckIntervalMs: 20,
      });
      await periodic.start();

      registry.register(createFailingTool('nope', 'late'));
      await vi.waitFor(() => {
        expect(periodic.getAvailableTools()).toContain('late');
      });

      await periodic.stop();
    });
  });
});

describe('synthesizeToolResults', () => {
  it('says so when nothing ran', () => {
    expect(synthesizeToolResults([])).toBe('No tools were executed.');
  });
});

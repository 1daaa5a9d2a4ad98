import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CoordinatorAgent, buildSynthesisPrompt, fallbackSynthesis } from './coordinator-agent.js';
import type { CoordinatorAgentOptions } from './coordinator-agent.js';
import { ToolExecutorAgent } from './tool-executor-agent.js';
import type { ConversationId } from '@/core/types.js';
import { createMessageBus } from '@/messaging/message-bus.js';
import {
  createAgentRequestMessage,
  createCoordinationMessage,
  createUserQueryMessage,
} from '@/messaging/message-factory.js';
import type { MessageBus } from '@/messaging/types.js';
import type { Logger } from '@/observability/logger.js';
import { createMathTool } from '@/tools/definitions/math.js';
import { createToolRegistry } from '@/tools/registry/tool-registry.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';
import { createFakeModelBackend } from '@/testing/fixtures/model-backend.js';
import type { ModelBackend } from '@/providers/types.js';

const MATH_RESULT = 'Tool execution results:\n- math: {"expression":"15 * 23","result":345}';

function userQuery(query: string, conversationId?: ConversationId) {
  return createUserQueryMessage({ senderId: 'user-1', userId: 'user-1', query, conversationId });
}

describe('CoordinatorAgent', () => {
  let logger: Logger;
  let bus: MessageBus;
  let executor: ToolExecutorAgent;
  let coordinator: CoordinatorAgent;

  async function setup(options: Partial<CoordinatorAgentOptions> = {}, withExecutor = true): Promise<void> {
    coordinator = new CoordinatorAgent({ bus, logger, delegationTimeoutMs: 2000, ...options });
    await coordinator.start();
    coordinator.registerAgent(coordinator.getProfile());
    if (withExecutor) {
      await executor.start();
      coordinator.registerAgent(executor.getProfile());
    }
  }

  beforeEach(() => {
    logger = createMockLogger();
    bus = createMessageBus({ logger, pollIntervalMs: 10 });
    bus.start();

    const tools = createToolRegistry({ logger });
    tools.register(createMathTool());
    executor = new ToolExecutorAgent({ bus, logger, toolProvider: tools });
  });

  afterEach(async () => {
    await coordinator.stop();
    await executor.stop();
    await bus.stop();
  });

  it('uses the default identity', async () => {
    await setup();

    expect(coordinator.agentId).toBe('coordinator_001');
    expect(coordinator.name).toBe('Coordinator');
    expect(coordinator.getProfile().capabilities).toEqual(['reasoning', 'memory', 'privacy']);
  });

  describe('user queries', () => {
    it('reports when no agent has the required capabilities', async () => {
      coordinator = new CoordinatorAgent({ bus, logger });
      await coordinator.start();
      const query = userQuery('hello there');

      const reply = await coordinator.processMessage(query);

      expect(reply?.type).toBe('error');
      expect(reply?.content).toBe('NoAgentsAvailable: No agents available with required capabilities');
      expect(reply?.recipientId).toBe('user-1');
      expect(reply?.parentMessageId).toBe(query.id);
    });

    it('delegates to the tool executor and falls back without a model backend', async () => {
      await setup();

      const reply = await coordinator.processMessage(userQuery('Calculate 15 * 23'));

      expect(reply?.type).toBe('agent_response');
      expect(reply?.content).toBe(`Based on the responses from 1 agent:\n\nAgent ToolExecutor: ${MATH_RESULT}`);
      if (reply?.type === 'agent_response') {
        expect(reply.payload.toolsUsed).toEqual(['Coordinator', 'ToolExecutor']);
        expect(reply.payload.confidence).toBe(0.9);
      }
    });

    it('records the conversation', async () => {
      await setup();
      const conversationId = 'conv-1' as ConversationId;

      const reply = await coordinator.processMessage(userQuery('Calculate 15 * 23', conversationId));

      expect(reply?.conversationId).toBe(conversationId);
      expect(coordinator.getConversation(conversationId)).toMatchObject({
        userQuery: 'Calculate 15 * 23',
        requiredCapabilities: ['math', 'reasoning'],
        selectedAgentIds: ['coordinator_001', 'tool_executor_001'],
        status: 'completed',
      });
      expect(coordinator.getConversationStatus()).toEqual({
        activeConversations: 0,
        totalConversations: 1,
        registeredAgents: 2,
        activeAgents: 2,
      });
    });

    it('answers directly and synthesizes with a model backend', async () => {
      const backend = createFakeModelBackend(['direct answer', 'final synthesis']);
      await setup({ modelBackend: backend });

      const reply = await coordinator.processMessage(userQuery('Calculate 15 * 23'));

      expect(reply?.content).toBe('final synthesis');
      expect(backend.prompts[0]).toBe('Calculate 15 * 23');
      expect(backend.prompts[1]).toBe(
        'User Query: Calculate 15 * 23\n\n' +
          'Agent Responses:\n' +
          '- Coordinator: direct answer\n' +
          `- ToolExecutor: ${MATH_RESULT}\n\n` +
          'Please synthesize these responses into a coherent, helpful answer for the user. ' +
          'Focus on the most relevant information and provide a clear, concise response.',
      );
    });

    it('falls back when synthesis fails', async () => {
      await setup({ modelBackend: createFakeModelBackend(['direct answer', new Error('down')]) });

      const reply = await coordinator.processMessage(userQuery('Calculate 15 * 23'));

      expect(reply?.content).toBe(
        `Based on the responses from 2 agents:\n\nAgent Coordinator: direct answer\n\nAgent ToolExecutor: ${MATH_RESULT}`,
      );
    });

    it('falls back when synthesis returns blank text', async () => {
      await setup({ modelBackend: createFakeModelBackend(['direct answer', '   ']) });

      const reply = await coordinator.processMessage(userQuery('Calculate 15 * 23'));

      expect(reply?.content).toBe(
        `Based on the responses from 2 agents:\n\nAgent Coordinator: direct answer\n\nAgent ToolExecutor: ${MATH_RESULT}`,
      );
    });

    it('apologises when every delegation fails or times out', async () => {
      await setup({ delegationTimeoutMs: 50 }, false);
      bus.registerHandler('silent', () => undefined);
      coordinator.registerAgent({
        agentId: 'silent',
        name: 'Silent',
        role: 'calculator',
        capabilities: ['math'],
        description: 'Never answers',
        isActive: true,
        createdAt: new Date(),
      });

      const reply = await coordinator.processMessage(userQuery('Calculate 1 + 1'));

      expect(reply?.type).toBe('agent_response');
      expect(reply?.content).toBe(
        'I apologize, but I was unable to get responses from any agents to help with your query.',
      );
    });

    it('bounds each delegation from its own start when tasks outnumber slots', async () => {
      let calls = 0;
      const stalling: ModelBackend = {
        id: 'fake:stalling',
        generate() {
          calls++;
          // the direct answer never arrives; synthesis does
          return calls === 1 ? new Promise<string>(() => undefined) : Promise.resolve('combined');
        },
      };
      await setup({ delegationTimeoutMs: 100, maxConcurrentTasks: 1, modelBackend: stalling }, false);
      bus.registerHandler('silent', () => undefined);
      coordinator.registerAgent({
        agentId: 'silent',
        name: 'Silent',
        role: 'calculator',
        capabilities: ['math'],
        description: 'Never answers',
        isActive: true,
        createdAt: new Date(),
      });

      const startedAt = Date.now();
      const reply = await coordinator.processMessage(userQuery('Calculate 1 + 1'));

      expect(reply?.content).toBe('combined');
      expect(Date.now() - startedAt).toBeLessThan(1000);
      expect(calls).toBe(2);
    });
  });

  describe('agent requests', () => {
    it('forwards to an agent with the requested capability', async () => {
      await setup();

      const reply = await coordinator.processMessage(
        createAgentRequestMessage({
          senderId: 'someone',
          requestedCapability: 'math',
          taskDescription: 'Calculate 2 + 2',
        }),
      );

      expect(reply?.type).toBe('agent_response');
      expect(reply?.content).toBe('Request forwarded to ToolExecutor');
    });

    it('fails when no other agent has the capability', async () => {
      await setup();

      const reply = await coordinator.processMessage(
        createAgentRequestMessage({
          senderId: 'someone',
          requestedCapability: 'general_assistance',
          taskDescription: 'help',
        }),
      );

      expect(reply?.content).toBe(
        'AgentRequestError: No agent available for capability "general_assistance"',
      );
    });
  });

  describe('coordination', () => {
    it('records heartbeats in the registry', async () => {
      await setup();
      expect(coordinator.getRegistry().get('tool_executor_001')?.lastActivity).toBeUndefined();

      const reply = await coordinator.processMessage(
        createCoordinationMessage({
          senderId: 'tool_executor_001',
          coordinationType: 'health',
          action: 'heartbeat',
        }),
      );

      expect(reply).toBeUndefined();
      expect(coordinator.getRegistry().get('tool_executor_001')?.lastActivity).toBeInstanceOf(Date);
    });
  });

  describe('monitors', () => {
    it('flags active agents that have gone quiet', async () => {
      await setup();
      executor.getProfile().lastActivity = new Date('2025-01-01T00:00:00Z');

      const flagged = coordinator.checkAgentHealth(new Date('2025-01-01T00:10:00Z'));

      expect(flagged).toEqual(['tool_executor_001']);
      expect(coordinator.getRegistry().get('tool_executor_001')?.isActive).toBe(true);
    });

    it('evicts finished conversations after the retention window', async () => {
      await setup();
      await coordinator.processMessage(userQuery('Calculate 15 * 23'));

      expect(coordinator.cleanupConversations(new Date())).toBe(0);
      expect(coordinator.cleanupConversations(new Date(Date.now() + 3_600_001 + 1000))).toBe(1);
      expect(coordinator.getConversationStatus().totalConversations).toBe(0);
    });
  });
});

describe('synthesis helpers', () => {
  it('lists failures in the prompt', () => {
    const prompt = buildSynthesisPrompt('q', [
      { agentId: 'a', agentName: 'A', success: false, error: 'boom' },
    ]);

    expect(prompt.split('\n')[3]).toBe('- A: Error - boom');
  });

  it('ignores failures in the fallback', () => {
    expect(
      fallbackSynthesis([
        { agentId: 'a', agentName: 'A', success: true, response: 'yes' },
        { agentId: 'b', agentName: 'B', success: false, error: 'no' },
      ]),
    ).toBe('Based on the responses from 1 agent:\n\nAgent A: yes');
  });
});

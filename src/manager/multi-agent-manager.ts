/**
 * Multi-Agent Manager — process-level facade over the bus and the agents.
 *
 * Owns the message bus, the coordinator and the tool executor, answers user
 * queries through the coordinator, and keeps query statistics.
 * `processUserQuery` never throws; every failure becomes a message string.
 */
import type { BaseAgent } from '@/agents/base-agent.js';
import { CoordinatorAgent } from '@/agents/coordinator-agent.js';
import type { ConversationSummary } from '@/agents/coordinator-agent.js';
import { ToolExecutorAgent } from '@/agents/tool-executor-agent.js';
import type { AgentCapability, AgentProfile, AgentRole, AgentStatus } from '@/agents/types.js';
import type { OrchestratorConfig } from '@/config/schema.js';
import { errorMessage } from '@/core/errors.js';
import type { ConversationId } from '@/core/types.js';
import { createMessageBus } from '@/messaging/message-bus.js';
import { createUserQueryMessage } from '@/messaging/message-factory.js';
import type { BusStats, HistoryFilter, Message, MessageBus } from '@/messaging/types.js';
import type { Logger } from '@/observability/logger.js';
import type { ModelBackend } from '@/providers/types.js';
import { createMathTool } from '@/tools/definitions/math.js';
import { createToolRegistry } from '@/tools/registry/tool-registry.js';
import type { ToolProvider } from '@/tools/types.js';

// ─── Types ───────────────────────────────────────────────────────

export const NOT_RUNNING_RESPONSE =
  'Multi-agent system is not running. Please start the system first.';

export interface QueryStatistics {
  totalQueries: number;
  successfulQueries: number;
  failedQueries: number;
  averageResponseTimeMs: number;
  lastQueryTime?: Date;
}

export interface SystemStatus {
  isInitialized: boolean;
  isRunning: boolean;
  startTime?: Date;
  totalAgents: number;
  activeAgents: number;
  statistics: QueryStatistics;
  coordinator?: ConversationSummary;
  messageBus: BusStats;
}

export interface PerformanceMetrics {
  totalQueries: number;
  successfulQueries: number;
  failedQueries: number;
  successRatePercent: number;
  averageResponseTimeMs: number;
  uptimeMs: number;
  lastQueryTime?: Date;
}

export interface MultiAgentManager {
  initialize(): Promise<boolean>;
  start(): Promise<boolean>;
  stop(): Promise<boolean>;
  shutdown(): Promise<boolean>;
  isRunning(): boolean;

  /** Answer a user query. Never throws. */
  processUserQuery(userId: string, query: string, context?: Record<string, unknown>): Promise<string>;

  getSystemStatus(): SystemStatus;
  getAgentStatus(agentId: string): AgentStatus | undefined;
  getAllAgentsStatus(): Record<string, AgentStatus>;
  getPerformanceMetrics(): PerformanceMetrics;

  addAgent(agent: BaseAgent): Promise<boolean>;
  removeAgent(agentId: string): Promise<boolean>;
  getCoordinator(): CoordinatorAgent | undefined;
  getAvailableCapabilities(): AgentCapability[];
  getAgentsByCapability(capability: AgentCapability): AgentProfile[];
  getAgentsByRole(role: AgentRole): AgentProfile[];

  getMessageHistory(filter?: HistoryFilter): Message[];
  broadcastMessage(message: Message): Promise<boolean>;
  sendMessageToAgent(agentId: string, message: Message): Promise<boolean>;
}

export interface MultiAgentManagerDeps {
  config: OrchestratorConfig;
  logger: Logger;
  modelBackend?: ModelBackend;
  /** Defaults to an in-memory registry holding the math tool. */
  toolProvider?: ToolProvider;
  /** Defaults to a bus built from `config.bus`. */
  bus?: MessageBus;
}

// ─── Factory Function ────────────────────────────────────────────

export function createMultiAgentManager(deps: MultiAgentManagerDeps): MultiAgentManager {
  const { config, logger, modelBackend } = deps;
  const bus = deps.bus ?? createMessageBus({ logger, ...config.bus });

  const agents = new Map<string, BaseAgent>();
  let coordinator: CoordinatorAgent | undefined;
  let initialized = false;
  let running = false;
  let startTime: Date | undefined;

  const statistics: QueryStatistics = {
    totalQueries: 0,
    successfulQueries: 0,
    failedQueries: 0,
    averageResponseTimeMs: 0,
  };

  function defaultToolProvider(): ToolProvider {
    const registry = createToolRegistry({ logger });
    registry.register(createMathTool());
    return registry;
  }

  function profiles(): AgentProfile[] {
    return [...agents.values()].map((agent) => ({ ...agent.getProfile() }));
  }

  function registerWithCoordinator(agent: BaseAgent): void {
    if (coordinator && !coordinator.getRegistry().has(agent.agentId)) {
      coordinator.registerAgent(agent.getProfile());
    }
  }

  async function stopAgents(): Promise<void> {
    for (const agent of [...agents.values()].reverse()) {
      await agent.stop();
    }
    await bus.stop();
  }

  function recordFailure(): void {
    statistics.failedQueries++;
  }

  function recordSuccess(elapsedMs: number): void {
    statistics.successfulQueries++;
    statistics.averageResponseTimeMs +=
      (elapsedMs - statistics.averageResponseTimeMs) / statistics.successfulQueries;
  }

  const manager: MultiAgentManager = {
    async initialize(): Promise<boolean> {
      if (initialized) return true;

      try {
        bus.start();

        coordinator = new CoordinatorAgent({
          bus,
          logger,
          agentId: config.agents.coordinatorId,
          maxConcurrentTasks: config.agents.maxConcurrentTasks,
          modelBackend,
          ...config.coordinator,
        });
        const toolExecutor = new ToolExecutorAgent({
          bus,
          logger,
          agentId: config.agents.toolExecutorId,
          maxConcurrentTasks: config.agents.maxConcurrentTasks,
          toolProvider: deps.toolProvider ?? defaultToolProvider(),
          ...config.toolExecutor,
        });

        for (const agent of [coordinator, toolExecutor]) {
          if (!(await agent.start())) {
            throw new Error(`Agent "${agent.agentId}" failed to start`);
          }
          agents.set(agent.agentId, agent);
          registerWithCoordinator(agent);
        }

        initialized = true;
        logger.info('Multi-agent system initialized', {
          component: 'multi-agent-manager',
          agents: [...agents.keys()],
          modelBackend: modelBackend?.id ?? 'none',
        });
        return true;
      } catch (error) {
        logger.error('Failed to initialize multi-agent system', {
          component: 'multi-agent-manager',
          error: errorMessage(error),
        });
        await stopAgents();
        agents.clear();
        coordinator = undefined;
        return false;
      }
    },

    async start(): Promise<boolean> {
      if (running) return true;

      if (!initialized) {
        if (!(await manager.initialize())) return false;
      } else {
        bus.start();
        for (const agent of agents.values()) {
          if (!(await agent.start())) {
            logger.error('Agent failed to restart', {
              component: 'multi-agent-manager',
              agentId: agent.agentId,
            });
            return false;
          }
          registerWithCoordinator(agent);
        }
      }

      running = true;
      startTime = new Date();
      logger.info('Multi-agent system started', {
        component: 'multi-agent-manager',
        agents: agents.size,
      });
      return true;
    },

    async stop(): Promise<boolean> {
      const wasRunning = running;
      running = false;
      await stopAgents();

      if (wasRunning) {
        logger.info('Multi-agent system stopped', {
          component: 'multi-agent-manager',
          totalQueries: statistics.totalQueries,
        });
      }
      return true;
    },

    shutdown(): Promise<boolean> {
      return manager.stop();
    },

    isRunning(): boolean {
      return running;
    },

    async processUserQuery(userId, query, context = {}): Promise<string> {
      if (!running) return NOT_RUNNING_RESPONSE;

      statistics.totalQueries++;
      statistics.lastQueryTime = new Date();
      const startedAt = Date.now();

      try {
        if (!coordinator) {
          recordFailure();
          return 'Error: Coordinator agent not available';
        }

        const rawConversationId = context['conversationId'];
        const message = createUserQueryMessage({
          senderId: userId,
          recipientId: coordinator.agentId,
          userId,
          query,
          context,
          conversationId:
            typeof rawConversationId === 'string' ? (rawConversationId as ConversationId) : undefined,
        });

        const reply = await coordinator.processMessage(message);

        if (reply?.type === 'agent_response') {
          recordSuccess(Date.now() - startedAt);
          return reply.content;
        }

        recordFailure();
        if (reply?.type === 'error') {
          logger.warn('Query answered with an error', {
            component: 'multi-agent-manager',
            userId,
            conversationId: reply.conversationId,
            error: reply.content,
          });
          return `Error: ${reply.content}`;
        }
        return 'Error: Failed to process query';
      } catch (error) {
        recordFailure();
        logger.error('Query processing raised', {
          component: 'multi-agent-manager',
          userId,
          error: errorMessage(error),
        });
        return `I apologize, but I encountered an error: ${errorMessage(error)}`;
      }
    },

    getSystemStatus(): SystemStatus {
      return {
        isInitialized: initialized,
        isRunning: running,
        startTime,
        totalAgents: agents.size,
        activeAgents: [...agents.values()].filter((agent) => agent.isActive).length,
        statistics: { ...statistics },
        coordinator: coordinator?.getConversationStatus(),
        messageBus: bus.getBusStats(),
      };
    },

    getAgentStatus(agentId: string): AgentStatus | undefined {
      return agents.get(agentId)?.getStatus();
    },

    getAllAgentsStatus(): Record<string, AgentStatus> {
      const statuses: Record<string, AgentStatus> = {};
      for (const [agentId, agent] of agents) {
        statuses[agentId] = agent.getStatus();
      }
      return statuses;
    },

    getPerformanceMetrics(): PerformanceMetrics {
      const { totalQueries, successfulQueries, failedQueries } = statistics;
      return {
        totalQueries,
        successfulQueries,
        failedQueries,
        successRatePercent: totalQueries > 0 ? (successfulQueries / totalQueries) * 100 : 0,
        averageResponseTimeMs: statistics.averageResponseTimeMs,
        uptimeMs: running && startTime ? Date.now() - startTime.getTime() : 0,
        lastQueryTime: statistics.lastQueryTime,
      };
    },

    async addAgent(agent: BaseAgent): Promise<boolean> {
      if (agents.has(agent.agentId)) {
        logger.warn('Agent already exists', {
          component: 'multi-agent-manager',
          agentId: agent.agentId,
        });
        return false;
      }
      if (!(await agent.start())) return false;

      agents.set(agent.agentId, agent);
      registerWithCoordinator(agent);
      logger.info('Added agent', {
        component: 'multi-agent-manager',
        agentId: agent.agentId,
        role: agent.role,
      });
      return true;
    },

    async removeAgent(agentId: string): Promise<boolean> {
      const agent = agents.get(agentId);
      if (!agent) return false;

      await agent.stop();
      agents.delete(agentId);
      coordinator?.unregisterAgent(agentId);
      if (agent === coordinator) coordinator = undefined;

      logger.info('Removed agent', { component: 'multi-agent-manager', agentId });
      return true;
    },

    getCoordinator(): CoordinatorAgent | undefined {
      return coordinator;
    },

    getAvailableCapabilities(): AgentCapability[] {
      const capabilities = new Set<AgentCapability>();
      for (const profile of profiles()) {
        for (const capability of profile.capabilities) capabilities.add(capability);
      }
      return [...capabilities];
    },

    getAgentsByCapability(capability: AgentCapability): AgentProfile[] {
      return profiles().filter((profile) => profile.capabilities.includes(capability));
    },

    getAgentsByRole(role: AgentRole): AgentProfile[] {
      return profiles().filter((profile) => profile.role === role);
    },

    getMessageHistory(filter?: HistoryFilter): Message[] {
      return bus.getMessageHistory(filter);
    },

    async broadcastMessage(message: Message): Promise<boolean> {
      if (!running) return false;
      return bus.broadcastMessage(message);
    },

    async sendMessageToAgent(agentId: string, message: Message): Promise<boolean> {
      if (!running) return false;
      return bus.sendMessage({ ...message, recipientId: agentId });
    },
  };

  return manager;
}

/**
 * CoordinatorAgent — turns a user query into delegated work and one answer.
 *
 * For each query it classifies the needed capabilities, picks matching agents
 * from its registry, asks each of them in parallel with a bounded wait, and
 * synthesizes whatever came back. One agent failing never sinks the query.
 */
import {
  AgentRequestError,
  NoAgentsAvailableError,
  errorMessage,
} from '@/core/errors.js';
import type { ConversationId } from '@/core/types.js';
import {
  createAgentRequestMessage,
  createAgentResponseMessage,
  createConversationId,
  createErrorMessage,
} from '@/messaging/message-factory.js';
import type {
  AgentRequestMessage,
  CoordinationMessage,
  Message,
  UserQueryMessage,
} from '@/messaging/types.js';
import type { ModelBackend } from '@/providers/types.js';
import { createAgentRegistry } from './agent-registry.js';
import { BaseAgent } from './base-agent.js';
import type { AgentDeps } from './base-agent.js';
import { createKeywordClassifier } from './capability-classifier.js';
import { isAgentCapability } from './types.js';
import type { AgentCapability, AgentProfile, AgentRegistry, CapabilityClassifier } from './types.js';

// ─── Types ───────────────────────────────────────────────────────

export const COORDINATOR_ID = 'coordinator_001';

export type ConversationStatus = 'processing' | 'completed' | 'failed';

export interface ConversationState {
  conversationId: ConversationId;
  userQuery: string;
  requiredCapabilities: AgentCapability[];
  selectedAgentIds: string[];
  startTime: Date;
  status: ConversationStatus;
  endTime?: Date;
}

export interface ConversationSummary {
  activeConversations: number;
  totalConversations: number;
  registeredAgents: number;
  activeAgents: number;
}

/** What one delegated agent contributed to a query. */
export type AgentContribution =
  | { agentId: string; agentName: string; success: true; response: string }
  | { agentId: string; agentName: string; success: false; error: string };

type SuccessfulContribution = Extract<AgentContribution, { success: true }>;

export interface CoordinatorAgentOptions extends AgentDeps {
  agentId?: string;
  modelBackend?: ModelBackend;
  classifier?: CapabilityClassifier;
  /** Per-agent wait during delegation. Defaults to 30000. */
  delegationTimeoutMs?: number;
  healthCheckIntervalMs?: number;
  /** Active agents silent for longer than this are reported. Defaults to 300000. */
  inactivityThresholdMs?: number;
  /** Finished conversations are kept this long. Defaults to 3600000. */
  conversationRetentionMs?: number;
  cleanupIntervalMs?: number;
  responseConfidence?: number;
}

// ─── Synthesis ───────────────────────────────────────────────────

export function buildSynthesisPrompt(query: string, contributions: readonly AgentContribution[]): string {
  const lines = contributions.map((contribution) =>
    contribution.success
      ? `- ${contribution.agentName}: ${contribution.response}`
      : `- ${contribution.agentName}: Error - ${contribution.error}`,
  );

  return [
    `User Query: ${query}`,
    '',
    'Agent Responses:',
    ...lines,
    '',
    'Please synthesize these responses into a coherent, helpful answer for the user. ' +
      'Focus on the most relevant information and provide a clear, concise response.',
  ].join('\n');
}

/** Deterministic answer used when no model backend can synthesize. */
export function fallbackSynthesis(contributions: readonly AgentContribution[]): string {
  const successful = contributions.filter(
    (contribution): contribution is SuccessfulContribution => contribution.success,
  );
  if (successful.length === 0) {
    return 'I apologize, but I was unable to get responses from any agents to help with your query.';
  }

  const noun = successful.length === 1 ? 'agent' : 'agents';
  const entries = successful.map((contribution) => `Agent ${contribution.agentName}: ${contribution.response}`);
  return `Based on the responses from ${String(successful.length)} ${noun}:\n\n${entries.join('\n\n')}`;
}

// ─── Agent ───────────────────────────────────────────────────────

export class CoordinatorAgent extends BaseAgent {
  private readonly registry: AgentRegistry;
  private readonly modelBackend?: ModelBackend;
  private readonly classifier: CapabilityClassifier;
  private readonly delegationTimeoutMs: number;
  private readonly healthCheckIntervalMs: number;
  private readonly inactivityThresholdMs: number;
  private readonly conversationRetentionMs: number;
  private readonly cleanupIntervalMs: number;
  private readonly responseConfidence: number;
  private readonly conversations = new Map<ConversationId, ConversationState>();
  private healthInterval: ReturnType<typeof setInterval> | null = null;
  private cleanupInterval: ReturnType<typeof setInterval> | null = null;

  constructor(options: CoordinatorAgentOptions) {
    super({
      agentId: options.agentId ?? COORDINATOR_ID,
      name: 'Coordinator',
      role: 'coordinator',
      capabilities: ['reasoning', 'memory', 'privacy'],
      description: 'Routes user queries to capable agents and combines their answers',
      modelName: options.modelBackend?.id,
      bus: options.bus,
      logger: options.logger,
      maxConcurrentTasks: options.maxConcurrentTasks,
    });
    this.registry = createAgentRegistry({ logger: options.logger });
    this.modelBackend = options.modelBackend;
    this.classifier = options.classifier ?? createKeywordClassifier();
    this.delegationTimeoutMs = options.delegationTimeoutMs ?? 30_000;
    this.healthCheckIntervalMs = options.healthCheckIntervalMs ?? 60_000;
    this.inactivityThresholdMs = options.inactivityThresholdMs ?? 300_000;
    this.conversationRetentionMs = options.conversationRetentionMs ?? 3_600_000;
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? 300_000;
    this.responseConfidence = options.responseConfidence ?? 0.9;
  }

  // ─── Lifecycle Hooks ─────────────────────────────────────────

  protected override startProcesses(): Promise<void> {
    this.healthInterval = setInterval(() => {
      this.checkAgentHealth();
    }, this.healthCheckIntervalMs);
    this.healthInterval.unref();
    this.cleanupInterval = setInterval(() => {
      this.cleanupConversations();
    }, this.cleanupIntervalMs);
    this.cleanupInterval.unref();
    return Promise.resolve();
  }

  protected override stopProcesses(): Promise<void> {
    if (this.healthInterval) clearInterval(this.healthInterval);
    if (this.cleanupInterval) clearInterval(this.cleanupInterval);
    this.healthInterval = null;
    this.cleanupInterval = null;
    return Promise.resolve();
  }

  // ─── User Queries ────────────────────────────────────────────

  protected override async handleUserQuery(message: UserQueryMessage): Promise<Message> {
    const conversationId = message.conversationId ?? createConversationId();
    const { query } = message.payload;

    try {
      const required = await this.classifier.classify(query);
      const selected = this.registry.findByCapabilities(required);

      if (selected.length === 0) {
        const error = new NoAgentsAvailableError(required);
        this.logger.warn('No agents available for query', {
          component: 'coordinator',
          agentId: this.agentId,
          conversationId,
          requiredCapabilities: required,
        });
        return createErrorMessage({
          senderId: this.agentId,
          inReplyTo: message,
          conversationId,
          errorType: 'NoAgentsAvailable',
          errorDetails: error.message,
        });
      }

      const conversation: ConversationState = {
        conversationId,
        userQuery: query,
        requiredCapabilities: required,
        selectedAgentIds: selected.map((agent) => agent.agentId),
        startTime: new Date(),
        status: 'processing',
      };
      this.conversations.set(conversationId, conversation);

      this.logger.info('Delegating query', {
        component: 'coordinator',
        agentId: this.agentId,
        conversationId,
        requiredCapabilities: required,
        selectedAgents: conversation.selectedAgentIds,
      });

      const contributions = await this.delegate(selected, query, conversationId);
      const answer = await this.synthesize(query, contributions);

      conversation.status = 'completed';
      conversation.endTime = new Date();

      return createAgentResponseMessage({
        senderId: this.agentId,
        inReplyTo: message,
        conversationId,
        result: answer,
        confidence: this.responseConfidence,
        toolsUsed: selected.map((agent) => agent.name),
      });
    } catch (error) {
      const conversation = this.conversations.get(conversationId);
      if (conversation) {
        conversation.status = 'failed';
        conversation.endTime = new Date();
      }
      this.logger.error('Query processing failed', {
        component: 'coordinator',
        agentId: this.agentId,
        conversationId,
        error: errorMessage(error),
      });
      return createErrorMessage({
        senderId: this.agentId,
        inReplyTo: message,
        conversationId,
        errorType: 'QueryProcessingError',
        errorDetails: errorMessage(error),
      });
    }
  }

  /**
   * Ask every selected agent in parallel. Each wait starts as soon as that
   * agent's task is spawned and lasts at most `delegationTimeoutMs`.
   */
  private async delegate(
    selected: readonly AgentProfile[],
    query: string,
    conversationId: ConversationId,
  ): Promise<AgentContribution[]> {
    return Promise.all(
      selected.map(async (agent): Promise<AgentContribution> => {
        const handle = await this.createTask((signal) => this.consult(agent, query, conversationId, signal));
        const outcome = await this.waitForTask(handle, this.delegationTimeoutMs);
        if (outcome.ok) return outcome.value;

        this.logger.warn('Delegation failed', {
          component: 'coordinator',
          agentId: this.agentId,
          conversationId,
          targetAgentId: agent.agentId,
          error: outcome.error.message,
        });
        return { agentId: agent.agentId, agentName: agent.name, success: false, error: outcome.error.message };
      }),
    );
  }

  private async consult(
    agent: AgentProfile,
    query: string,
    conversationId: ConversationId,
    signal: AbortSignal,
  ): Promise<AgentContribution> {
    const base = { agentId: agent.agentId, agentName: agent.name };

    if (agent.agentId === this.agentId) {
      if (!this.modelBackend) {
        throw new AgentRequestError(this.agentId, 'No model backend configured for direct answers');
      }
      const response = await this.modelBackend.generate(query, { signal });
      return { ...base, success: true, response };
    }

    const request = createAgentRequestMessage({
      senderId: this.agentId,
      recipientId: agent.agentId,
      conversationId,
      requestedCapability: 'general_assistance',
      taskDescription: query,
    });
    const result = await this.requestReply(request, this.delegationTimeoutMs);
    if (!result.ok) throw result.error;

    const reply = result.value;
    switch (reply.type) {
      case 'agent_response':
        return { ...base, success: true, response: reply.payload.result };
      case 'tool_result':
        return reply.payload.success
          ? { ...base, success: true, response: reply.content }
          : { ...base, success: false, error: reply.payload.error ?? 'Tool execution failed' };
      case 'error':
        return { ...base, success: false, error: `${reply.payload.errorType}: ${reply.payload.errorDetails}` };
      default:
        return { ...base, success: false, error: `Unexpected reply of type ${reply.type}` };
    }
  }

  private async synthesize(query: string, contributions: readonly AgentContribution[]): Promise<string> {
    if (this.modelBackend) {
      try {
        const text = await this.modelBackend.generate(buildSynthesisPrompt(query, contributions));
        if (text.trim() !== '') return text;
        this.logger.warn('Model synthesis returned no text', {
          component: 'coordinator',
          agentId: this.agentId,
          backend: this.modelBackend.id,
        });
      } catch (error) {
        this.logger.warn('Model synthesis failed, using fallback', {
          component: 'coordinator',
          agentId: this.agentId,
          backend: this.modelBackend.id,
          error: errorMessage(error),
        });
      }
    }
    return fallbackSynthesis(contributions);
  }

  // ─── Agent Requests & Coordination ───────────────────────────

  /** Forward a request to the first other active agent with the requested capability. */
  protected override async handleAgentRequest(message: AgentRequestMessage): Promise<Message> {
    const { requestedCapability } = message.payload;
    const target = isAgentCapability(requestedCapability)
      ? this.registry
          .findByCapabilities([requestedCapability])
          .find((agent) => agent.agentId !== this.agentId && agent.agentId !== message.senderId)
      : undefined;

    if (!target) {
      return createErrorMessage({
        senderId: this.agentId,
        inReplyTo: message,
        errorType: 'AgentRequestError',
        errorDetails: new AgentRequestError(
          this.agentId,
          `No agent available for capability "${requestedCapability}"`,
        ).message,
      });
    }

    const forwarded = createAgentRequestMessage({
      senderId: this.agentId,
      recipientId: target.agentId,
      parentMessageId: message.id,
      conversationId: message.conversationId,
      requestedCapability,
      taskDescription: message.payload.taskDescription,
      requiredTools: message.payload.requiredTools,
      expectedOutputFormat: message.payload.expectedOutputFormat,
    });

    if (!(await this.sendMessage(forwarded))) {
      return createErrorMessage({
        senderId: this.agentId,
        inReplyTo: message,
        errorType: 'AgentRequestError',
        errorDetails: `Failed to forward request to ${target.name}`,
      });
    }

    return createAgentResponseMessage({
      senderId: this.agentId,
      inReplyTo: message,
      result: `Request forwarded to ${target.name}`,
      confidence: this.responseConfidence,
    });
  }

  protected override handleCoordination(message: CoordinationMessage): Promise<undefined> {
    const { action, coordinationType } = message.payload;
    if (action === 'heartbeat') {
      this.registry.touch(message.senderId);
    } else {
      this.logger.info('Ignoring coordination action', {
        component: 'coordinator',
        agentId: this.agentId,
        senderId: message.senderId,
        coordinationType,
        action,
      });
    }
    return Promise.resolve(undefined);
  }

  // ─── Monitors ────────────────────────────────────────────────

  /** Report active agents silent for longer than the inactivity threshold. */
  checkAgentHealth(now: Date = new Date()): string[] {
    const stale = this.registry
      .listActive()
      .filter(
        (agent) =>
          agent.lastActivity !== undefined &&
          now.getTime() - agent.lastActivity.getTime() > this.inactivityThresholdMs,
      );

    for (const agent of stale) {
      this.logger.warn('Agent has been inactive', {
        component: 'coordinator',
        agentId: this.agentId,
        inactiveAgentId: agent.agentId,
        lastActivity: agent.lastActivity,
      });
    }
    return stale.map((agent) => agent.agentId);
  }

  /** Evict finished conversations older than the retention window. */
  cleanupConversations(now: Date = new Date()): number {
    let evicted = 0;
    for (const [conversationId, conversation] of this.conversations) {
      if (conversation.status === 'processing' || conversation.endTime === undefined) continue;
      if (now.getTime() - conversation.endTime.getTime() > this.conversationRetentionMs) {
        this.conversations.delete(conversationId);
        evicted++;
      }
    }

    if (evicted > 0) {
      this.logger.debug('Evicted finished conversations', {
        component: 'coordinator',
        agentId: this.agentId,
        evicted,
      });
    }
    return evicted;
  }

  // ─── Registry & Conversations ────────────────────────────────

  registerAgent(profile: AgentProfile): boolean {
    return this.registry.register(profile);
  }

  unregisterAgent(agentId: string): boolean {
    return this.registry.unregister(agentId);
  }

  getRegistry(): AgentRegistry {
    return this.registry;
  }

  getRegisteredAgents(): AgentProfile[] {
    return this.registry.list();
  }

  getConversation(conversationId: ConversationId): ConversationState | undefined {
    const conversation = this.conversations.get(conversationId);
    if (!conversation) return undefined;
    return {
      ...conversation,
      requiredCapabilities: [...conversation.requiredCapabilities],
      selectedAgentIds: [...conversation.selectedAgentIds],
    };
  }

  getConversationStatus(): ConversationSummary {
    let activeConversations = 0;
    for (const conversation of this.conversations.values()) {
      if (conversation.status === 'processing') activeConversations++;
    }
    return {
      activeConversations,
      totalConversations: this.conversations.size,
      registeredAgents: this.registry.size,
      activeAgents: this.registry.listActive().length,
    };
  }
}

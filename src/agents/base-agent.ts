/**
 * BaseAgent — lifecycle, message dispatch, bounded tasks and request/reply
 * correlation shared by every agent on the bus.
 *
 * Concrete agents override the protected hooks. Incoming messages are handled
 * off the bus delivery loop, so an agent waiting on a reply inside one handler
 * can still receive that reply.
 */
import {
  MessageDeliveryError,
  OrchestratorError,
  TaskCancelledError,
  TaskTimeoutError,
  errorMessage,
} from '@/core/errors.js';
import { raceWithTimeout } from '@/core/async.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { MessageId } from '@/core/types.js';
import { createErrorMessage } from '@/messaging/message-factory.js';
import type {
  AgentRequestMessage,
  CoordinationMessage,
  Message,
  MessageBus,
  ToolRequestMessage,
  UserQueryMessage,
} from '@/messaging/types.js';
import type { Logger } from '@/observability/logger.js';
import { createTaskPool } from './task-pool.js';
import type { TaskHandle, TaskPool, TaskWork } from './task-pool.js';
import type {
  AgentCapability,
  AgentLifecycleState,
  AgentProfile,
  AgentRole,
  AgentStatus,
} from './types.js';

// ─── Options ─────────────────────────────────────────────────────

/** Collaborators every agent receives. */
export interface AgentDeps {
  bus: MessageBus;
  logger: Logger;
  /** Upper bound on concurrently running tasks. Defaults to 5. */
  maxConcurrentTasks?: number;
}

export interface BaseAgentOptions extends AgentDeps {
  agentId: string;
  name: string;
  role: AgentRole;
  capabilities: AgentCapability[];
  description: string;
  modelName?: string;
}

type ReplyOutcome = Result<Message, OrchestratorError>;

const DEFAULT_MAX_CONCURRENT_TASKS = 5;

// ─── Base Class ──────────────────────────────────────────────────

export abstract class BaseAgent {
  protected readonly bus: MessageBus;
  protected readonly logger: Logger;
  private readonly profile: AgentProfile;
  private readonly tasks: TaskPool;
  private readonly pendingReplies = new Map<MessageId, (outcome: ReplyOutcome) => void>();
  private readonly inFlight = new Set<Promise<void>>();
  private state: AgentLifecycleState = 'uninitialized';
  private startedAt?: Date;

  protected constructor(options: BaseAgentOptions) {
    this.bus = options.bus;
    this.logger = options.logger;
    this.profile = {
      agentId: options.agentId,
      name: options.name,
      role: options.role,
      capabilities: [...options.capabilities],
      description: options.description,
      modelName: options.modelName,
      isActive: false,
      createdAt: new Date(),
    };
    this.tasks = createTaskPool({
      maxConcurrent: options.maxConcurrentTasks ?? DEFAULT_MAX_CONCURRENT_TASKS,
      ownerId: options.agentId,
      logger: options.logger,
    });
  }

  // ─── Identity ────────────────────────────────────────────────

  get agentId(): string {
    return this.profile.agentId;
  }

  get name(): string {
    return this.profile.name;
  }

  get role(): AgentRole {
    return this.profile.role;
  }

  get lifecycleState(): AgentLifecycleState {
    return this.state;
  }

  get isActive(): boolean {
    return this.state === 'active';
  }

  /** The live profile. Registries hold this object to observe activity. */
  getProfile(): AgentProfile {
    return this.profile;
  }

  hasCapability(capability: AgentCapability): boolean {
    return this.profile.capabilities.includes(capability);
  }

  canPerformRole(role: AgentRole): boolean {
    return this.profile.role === role;
  }

  // ─── Lifecycle ───────────────────────────────────────────────

  async initialize(): Promise<boolean> {
    if (this.state === 'initialized' || this.state === 'active') return true;

    const registered = this.bus.registerHandler(this.agentId, (message) => {
      this.receive(message);
    });
    if (!registered) {
      this.logger.error('Agent could not register with the message bus', {
        component: 'agent',
        agentId: this.agentId,
      });
      return false;
    }

    try {
      await this.initializeComponents();
    } catch (error) {
      this.bus.unregisterHandler(this.agentId);
      this.logger.error('Agent initialization failed', {
        component: 'agent',
        agentId: this.agentId,
        error: errorMessage(error),
      });
      return false;
    }

    this.state = 'initialized';
    this.logger.info('Agent initialized', {
      component: 'agent',
      agentId: this.agentId,
      role: this.role,
    });
    return true;
  }

  async start(): Promise<boolean> {
    if (this.state === 'active') return true;
    if (this.state !== 'initialized' && !(await this.initialize())) return false;

    this.state = 'active';
    this.profile.isActive = true;
    this.startedAt = new Date();

    try {
      await this.startProcesses();
    } catch (error) {
      this.logger.error('Agent failed to start its processes', {
        component: 'agent',
        agentId: this.agentId,
        error: errorMessage(error),
      });
      await this.stop();
      return false;
    }

    this.logger.info('Agent started', { component: 'agent', agentId: this.agentId });
    return true;
  }

  async stop(): Promise<boolean> {
    if (this.state === 'uninitialized' || this.state === 'stopped') return true;

    this.profile.isActive = false;

    const pending = [...this.pendingReplies.entries()];
    this.pendingReplies.clear();
    for (const [messageId, settle] of pending) {
      settle(err(new TaskCancelledError(messageId)));
    }

    const cancelledTasks = this.tasks.cancelAll();

    try {
      await this.stopProcesses();
    } catch (error) {
      this.logger.error('Agent failed to stop its processes', {
        component: 'agent',
        agentId: this.agentId,
        error: errorMessage(error),
      });
    }

    this.bus.unregisterHandler(this.agentId);
    this.state = 'stopped';
    this.startedAt = undefined;

    this.logger.info('Agent stopped', {
      component: 'agent',
      agentId: this.agentId,
      cancelledReplies: pending.length,
      cancelledTasks,
      inFlightMessages: this.inFlight.size,
    });
    return true;
  }

  shutdown(): Promise<boolean> {
    return this.stop();
  }

  // ─── Message Processing ──────────────────────────────────────

  /**
   * Dispatch a message to the matching hook. Never throws: a failing hook
   * becomes an `error` message addressed back to the sender.
   */
  async processMessage(message: Message): Promise<Message | undefined> {
    this.profile.lastActivity = new Date();

    try {
      switch (message.type) {
        case 'user_query':
          return await this.handleUserQuery(message);
        case 'agent_request':
          return await this.handleAgentRequest(message);
        case 'tool_request':
          return await this.handleToolRequest(message);
        case 'coordination':
          return await this.handleCoordination(message);
        case 'agent_response':
        case 'tool_result':
        case 'error':
          if (message.parentMessageId === undefined) break;
          this.logger.debug('Ignoring reply with no pending request', {
            component: 'agent',
            agentId: this.agentId,
            messageId: message.id,
            parentMessageId: message.parentMessageId,
          });
          return undefined;
      }

      this.logger.warn('Unhandled message type', {
        component: 'agent',
        agentId: this.agentId,
        messageId: message.id,
        messageType: message.type,
      });
      return undefined;
    } catch (error) {
      this.logger.error('Message processing failed', {
        component: 'agent',
        agentId: this.agentId,
        messageId: message.id,
        messageType: message.type,
        error: errorMessage(error),
      });
      return createErrorMessage({
        senderId: this.agentId,
        inReplyTo: message,
        errorType: 'MessageProcessingError',
        errorDetails: errorMessage(error),
        stackTrace: error instanceof Error ? error.stack : undefined,
      });
    }
  }

  /** Bus callback. Replies to pending requests settle them; anything else is handled in flight. */
  private receive(message: Message): void {
    const parentId = message.parentMessageId;
    if (parentId !== undefined) {
      const settle = this.pendingReplies.get(parentId);
      if (settle) {
        this.pendingReplies.delete(parentId);
        settle(ok(message));
        return;
      }
    }

    const handling = this.handleIncoming(message).finally(() => {
      this.inFlight.delete(handling);
    });
    this.inFlight.add(handling);
  }

  private async handleIncoming(message: Message): Promise<void> {
    try {
      const reply = await this.processMessage(message);
      if (!reply) return;

      if (reply.recipientId !== undefined && !this.bus.hasHandler(reply.recipientId)) {
        this.logger.debug('Dropping reply to unregistered recipient', {
          component: 'agent',
          agentId: this.agentId,
          messageId: reply.id,
          recipientId: reply.recipientId,
        });
        return;
      }
      await this.bus.sendMessage(reply);
    } catch (error) {
      this.logger.error('Failed to deliver reply', {
        component: 'agent',
        agentId: this.agentId,
        messageId: message.id,
        error: errorMessage(error),
      });
    }
  }

  // ─── Messaging ───────────────────────────────────────────────

  sendMessage(message: Message): Promise<boolean> {
    return this.bus.sendMessage(message);
  }

  broadcastMessage(message: Message): Promise<boolean> {
    return this.bus.broadcastMessage(message);
  }

  /**
   * Send `message` and wait for the reply whose `parentMessageId` is its id.
   */
  async requestReply(message: Message, timeoutMs: number): Promise<ReplyOutcome> {
    const reply = new Promise<ReplyOutcome>((resolve) => {
      this.pendingReplies.set(message.id, resolve);
    });

    const sent = await this.bus.sendMessage(message);
    if (!sent) {
      this.pendingReplies.delete(message.id);
      return err(
        new MessageDeliveryError(message.id, 'the bus did not accept the message', message.recipientId),
      );
    }

    const outcome = await raceWithTimeout(reply, timeoutMs);
    if (!outcome.timedOut) return outcome.value;

    this.pendingReplies.delete(message.id);
    this.logger.warn('No reply before deadline', {
      component: 'agent',
      agentId: this.agentId,
      messageId: message.id,
      recipientId: message.recipientId,
      timeoutMs,
    });
    return err(new TaskTimeoutError(message.id, timeoutMs));
  }

  // ─── Tasks ───────────────────────────────────────────────────

  /** Start bounded background work. Waits for a free slot when the agent is at capacity. */
  protected createTask<T>(work: TaskWork<T>): Promise<TaskHandle<T>> {
    return this.tasks.spawn(work);
  }

  protected waitForTask<T>(
    handle: TaskHandle<T>,
    timeoutMs?: number,
  ): Promise<Result<T, OrchestratorError>> {
    return this.tasks.wait(handle, timeoutMs);
  }

  // ─── Status ──────────────────────────────────────────────────

  getStatus(): AgentStatus {
    return {
      agentId: this.agentId,
      name: this.name,
      role: this.role,
      state: this.state,
      isActive: this.profile.isActive,
      capabilities: [...this.profile.capabilities],
      activeTasks: this.tasks.activeCount,
      pendingReplies: this.pendingReplies.size,
      inFlightMessages: this.inFlight.size,
      uptimeMs: this.startedAt ? Date.now() - this.startedAt.getTime() : 0,
      lastActivity: this.profile.lastActivity,
    };
  }

  // ─── Hooks ───────────────────────────────────────────────────

  protected initializeComponents(): Promise<void> {
    return Promise.resolve();
  }

  protected startProcesses(): Promise<void> {
    return Promise.resolve();
  }

  protected stopProcesses(): Promise<void> {
    return Promise.resolve();
  }

  protected handleUserQuery(message: UserQueryMessage): Promise<Message | undefined> {
    return this.unsupported(message);
  }

  protected handleAgentRequest(message: AgentRequestMessage): Promise<Message | undefined> {
    return this.unsupported(message);
  }

  protected handleToolRequest(message: ToolRequestMessage): Promise<Message | undefined> {
    return this.unsupported(message);
  }

  protected handleCoordination(message: CoordinationMessage): Promise<Message | undefined> {
    return this.unsupported(message);
  }

  private unsupported(message: Message): Promise<undefined> {
    this.logger.warn('Agent does not handle this message type', {
      component: 'agent',
      agentId: this.agentId,
      messageId: message.id,
      messageType: message.type,
    });
    return Promise.resolve(undefined);
  }
}

/**
 * ToolExecutorAgent — picks tools for a task, runs each under a hard
 * timeout and reports the combined outcome.
 *
 * `executeTool` never throws: unknown tools, timeouts and tool failures all
 * come back as a failed ToolExecutionResult, and every outcome is counted
 * in the per-tool stats and the execution log.
 */
import { nanoid } from 'nanoid';

import { raceWithTimeout } from '@/core/async.js';
import {
  OrchestratorError,
  ToolExecutionError,
  ToolNotFoundError,
  ToolTimeoutError,
  errorMessage,
} from '@/core/errors.js';
import type { ExecutionId } from '@/core/types.js';
import {
  createAgentResponseMessage,
  createToolResultMessage,
  formatValue,
} from '@/messaging/message-factory.js';
import type { AgentRequestMessage, Message, ToolRequestMessage } from '@/messaging/types.js';
import { createExecutionLog, truncateForLog } from '@/tools/execution-log.js';
import type { ExecutionLog } from '@/tools/execution-log.js';
import { createToolStatsTracker } from '@/tools/execution-stats.js';
import type {
  ExecutionLogEntry,
  ToolCallable,
  ToolDescriptor,
  ToolExecutionResult,
  ToolExecutionStats,
  ToolFailureKind,
  ToolProvider,
} from '@/tools/types.js';
import { BaseAgent } from './base-agent.js';
import type { AgentDeps } from './base-agent.js';
import { createKeywordToolSelector } from './tool-selector.js';
import type { ToolSelector } from './types.js';

// ─── Options ─────────────────────────────────────────────────────

export interface ToolExecutorAgentOptions extends AgentDeps {
  toolProvider: ToolProvider;
  agentId?: string;
  selector?: ToolSelector;
  /** Hard limit per tool call. Defaults to 30000. */
  defaultToolTimeoutMs?: number;
  /** How often the available tool list is refreshed. Defaults to 60000. */
  toolHealthCheckIntervalMs?: number;
  executionLogSize?: number;
  responseConfidence?: number;
}

export interface ToolListChange {
  added: string[];
  removed: string[];
}

export const TOOL_EXECUTOR_ID = 'tool_executor_001';

// ─── Result Synthesis ────────────────────────────────────────────

/** Render tool outcomes as one text block: successes first, then failures. */
export function synthesizeToolResults(results: readonly ToolExecutionResult[]): string {
  const successful = results.filter((result) => result.success);
  const failed = results.filter((result) => !result.success);
  const sections: string[] = [];

  if (successful.length > 0) {
    sections.push(
      ['Tool execution results:', ...successful.map((r) => `- ${r.toolName}: ${formatValue(r.result)}`)].join('\n'),
    );
  }
  if (failed.length > 0) {
    sections.push(
      ['Failed tool executions:', ...failed.map((r) => `- ${r.toolName}: ${r.error ?? 'unknown error'}`)].join('\n'),
    );
  }

  return sections.length > 0 ? sections.join('\n\n') : 'No tools were executed.';
}

// ─── Agent ───────────────────────────────────────────────────────

export class ToolExecutorAgent extends BaseAgent {
  private readonly toolProvider: ToolProvider;
  private readonly selector: ToolSelector;
  private readonly defaultToolTimeoutMs: number;
  private readonly toolHealthCheckIntervalMs: number;
  private readonly responseConfidence: number;
  private readonly stats = createToolStatsTracker();
  private readonly executionLog: ExecutionLog;
  private availableTools = new Map<string, ToolDescriptor>();
  private healthInterval: ReturnType<typeof setInterval> | null = null;

  constructor(options: ToolExecutorAgentOptions) {
    super({
      agentId: options.agentId ?? TOOL_EXECUTOR_ID,
      name: 'ToolExecutor',
      role: 'tool_executor',
      capabilities: ['tool_calling', 'code_execution', 'math', 'search', 'weather'],
      description: 'Selects and runs tools for tasks delegated by other agents',
      bus: options.bus,
      logger: options.logger,
      maxConcurrentTasks: options.maxConcurrentTasks,
    });
    this.toolProvider = options.toolProvider;
    this.selector = options.selector ?? createKeywordToolSelector();
    this.defaultToolTimeoutMs = options.defaultToolTimeoutMs ?? 30_000;
    this.toolHealthCheckIntervalMs = options.toolHealthCheckIntervalMs ?? 60_000;
    this.responseConfidence = options.responseConfidence ?? 0.9;
    this.executionLog = createExecutionLog(options.executionLogSize ?? 1000);
  }

  // ─── Lifecycle Hooks ─────────────────────────────────────────

  protected override async initializeComponents(): Promise<void> {
    await this.refreshAvailableTools();
  }

  protected override startProcesses(): Promise<void> {
    this.healthInterval = setInterval(() => void this.checkToolHealth(), this.toolHealthCheckIntervalMs);
    this.healthInterval.unref();
    return Promise.resolve();
  }

  protected override stopProcesses(): Promise<void> {
    if (this.healthInterval) {
      clearInterval(this.healthInterval);
      this.healthInterval = null;
    }
    return Promise.resolve();
  }

  // ─── Message Hooks ───────────────────────────────────────────

  protected override async handleToolRequest(message: ToolRequestMessage): Promise<Message> {
    const { toolName, parameters, timeoutMs } = message.payload;
    const outcome = await this.executeTool(toolName, parameters, timeoutMs);

    return createToolResultMessage({
      senderId: this.agentId,
      inReplyTo: message,
      toolName,
      success: outcome.success,
      result: outcome.result,
      error: outcome.error,
      executionTimeMs: outcome.executionTimeMs,
    });
  }

  protected override async handleAgentRequest(message: AgentRequestMessage): Promise<Message> {
    const { taskDescription, requiredTools } = message.payload;
    const tools = this.selector.selectTools(taskDescription, requiredTools, this.getAvailableTools());

    this.logger.info('Selected tools for task', {
      component: 'tool-executor',
      agentId: this.agentId,
      messageId: message.id,
      tools,
    });

    if (tools.length === 0) {
      return createAgentResponseMessage({
        senderId: this.agentId,
        inReplyTo: message,
        result: 'No tools required for this task',
        confidence: 1.0,
      });
    }

    const results: ToolExecutionResult[] = [];
    for (const toolName of tools) {
      const parameters = this.selector.extractParameters(taskDescription, toolName);
      results.push(await this.executeTool(toolName, parameters));
    }

    const successful = results.filter((result) => result.success);
    return createAgentResponseMessage({
      senderId: this.agentId,
      inReplyTo: message,
      result: synthesizeToolResults(results),
      confidence: this.responseConfidence,
      toolsUsed: successful.map((result) => result.toolName),
      executionTimeMs: successful.reduce((total, result) => total + result.executionTimeMs, 0),
    });
  }

  // ─── Execution ───────────────────────────────────────────────

  async executeTool(
    toolName: string,
    parameters: Record<string, unknown>,
    timeoutMs: number = this.defaultToolTimeoutMs,
  ): Promise<ToolExecutionResult> {
    const executionId = nanoid() as ExecutionId;
    const startTime = Date.now();
    this.executionLog.append(executionId, 'start', {
      toolName,
      parameters: truncateForLog(formatValue(parameters)),
      timeoutMs,
    });

    let callable: ToolCallable | undefined;
    try {
      callable = this.toolProvider.resolve(toolName);
    } catch (error) {
      return this.executionError(executionId, toolName, error, startTime);
    }
    if (!callable) {
      this.executionLog.append(executionId, 'tool_not_found', { toolName });
      return this.failure(executionId, toolName, 'ToolNotFound', new ToolNotFoundError(toolName), startTime);
    }

    this.executionLog.append(executionId, 'tool_found', { toolName });
    this.executionLog.append(executionId, 'execution_start', { toolName });

    const controller = new AbortController();
    try {
      const outcome = await raceWithTimeout(
        this.toolProvider.invoke(callable, parameters, { signal: controller.signal, executionId }),
        timeoutMs,
      );

      if (outcome.timedOut) {
        controller.abort();
        this.executionLog.append(executionId, 'execution_timeout', { toolName, timeoutMs });
        return this.failure(executionId, toolName, 'ToolTimeout', new ToolTimeoutError(toolName, timeoutMs), startTime);
      }

      const executionTimeMs = Date.now() - startTime;
      this.stats.record(toolName, true, executionTimeMs);
      this.executionLog.append(executionId, 'execution_success', {
        toolName,
        executionTimeMs,
        result: truncateForLog(formatValue(outcome.value)),
      });
      this.logger.info('Tool executed', {
        component: 'tool-executor',
        agentId: this.agentId,
        toolName,
        executionId,
        executionTimeMs,
      });
      return { executionId, toolName, success: true, result: outcome.value, executionTimeMs };
    } catch (error) {
      return this.executionError(executionId, toolName, error, startTime);
    }
  }

  private executionError(
    executionId: ExecutionId,
    toolName: string,
    error: unknown,
    startTime: number,
  ): ToolExecutionResult {
    const failure =
      error instanceof ToolExecutionError
        ? error
        : new ToolExecutionError(toolName, errorMessage(error), error instanceof Error ? error : undefined);
    this.executionLog.append(executionId, 'execution_error', {
      toolName,
      error: truncateForLog(failure.message),
    });
    return this.failure(executionId, toolName, 'ToolExecutionError', failure, startTime);
  }

  private failure(
    executionId: ExecutionId,
    toolName: string,
    errorKind: ToolFailureKind,
    error: OrchestratorError,
    startTime: number,
  ): ToolExecutionResult {
    const executionTimeMs = Date.now() - startTime;
    this.stats.record(toolName, false, executionTimeMs);
    this.logger.warn('Tool execution failed', {
      component: 'tool-executor',
      agentId: this.agentId,
      toolName,
      executionId,
      errorKind,
      error: error.message,
    });
    return { executionId, toolName, success: false, error: error.message, errorKind, executionTimeMs };
  }

  // ─── Tool Inventory ──────────────────────────────────────────

  /** Reload the provider's tool list and report what changed. */
  async refreshAvailableTools(): Promise<ToolListChange> {
    const descriptors = await this.toolProvider.listTools();
    const next = new Map(descriptors.map((descriptor) => [descriptor.name, descriptor]));

    const added = [...next.keys()].filter((name) => !this.availableTools.has(name));
    const removed = [...this.availableTools.keys()].filter((name) => !next.has(name));
    this.availableTools = next;

    if (added.length > 0 || removed.length > 0) {
      this.logger.info('Available tools changed', {
        component: 'tool-executor',
        agentId: this.agentId,
        added,
        removed,
        total: next.size,
      });
    }
    return { added, removed };
  }

  private async checkToolHealth(): Promise<void> {
    try {
      await this.refreshAvailableTools();
    } catch (error) {
      this.logger.error('Tool health check failed', {
        component: 'tool-executor',
        agentId: this.agentId,
        error: errorMessage(error),
      });
    }
  }

  getAvailableTools(): string[] {
    return [...this.availableTools.keys()];
  }

  getToolInfo(toolName: string): ToolDescriptor | undefined {
    return this.availableTools.get(toolName);
  }

  getToolStats(): Record<string, ToolExecutionStats>;
  getToolStats(toolName: string): ToolExecutionStats | undefined;
  getToolStats(toolName?: string): Record<string, ToolExecutionStats> | ToolExecutionStats | undefined {
    return toolName === undefined ? this.stats.getAll() : this.stats.get(toolName);
  }

  getExecutionLog(limit = 100): ExecutionLogEntry[] {
    return this.executionLog.recent(limit);
  }
}

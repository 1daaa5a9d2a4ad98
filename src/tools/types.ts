import type { z } from 'zod';
import type { OrchestratorError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import type { ExecutionId } from '@/core/types.js';

// ─── Tool Definition ────────────────────────────────────────────

/**
 * Static description of a tool. The `name` is what agents select and
 * request tools by (e.g. `math`, `web_search`).
 */
export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly category: string;
  readonly inputSchema: z.ZodType;
  /** When set, `invoke` rejects any output that does not parse. */
  readonly outputSchema?: z.ZodType;
}

/** Passed to every tool invocation. Tools should stop work once `signal` aborts. */
export interface ToolContext {
  signal: AbortSignal;
  executionId?: ExecutionId;
}

export interface ExecutableTool extends ToolDefinition {
  /** Run the tool on already-validated input. */
  execute(input: unknown, context: ToolContext): Promise<Result<unknown, OrchestratorError>>;
}

// ─── Tool Provider ──────────────────────────────────────────────

/** What a provider advertises about a tool, with its input schema as JSON Schema. */
export interface ToolDescriptor {
  name: string;
  description: string;
  category: string;
  parameters: Record<string, unknown>;
}

/** Opaque handle returned by `ToolProvider.resolve` and passed back to `invoke`. */
export type ToolCallable = ExecutableTool;

/**
 * Boundary between the executor agent and concrete tools.
 * `invoke` reports failure by throwing.
 */
export interface ToolProvider {
  listTools(): Promise<ToolDescriptor[]>;
  resolve(name: string): ToolCallable | undefined;
  invoke(
    callable: ToolCallable,
    params: Record<string, unknown>,
    options: { signal: AbortSignal; executionId?: ExecutionId },
  ): Promise<unknown>;
}

// ─── Execution Records ──────────────────────────────────────────

export type ToolFailureKind = 'ToolNotFound' | 'ToolTimeout' | 'ToolExecutionError';

export interface ToolExecutionResult {
  executionId: ExecutionId;
  toolName: string;
  success: boolean;
  result?: unknown;
  error?: string;
  errorKind?: ToolFailureKind;
  executionTimeMs: number;
}

export interface ToolExecutionStats {
  totalExecutions: number;
  successfulExecutions: number;
  failedExecutions: number;
  totalExecutionTimeMs: number;
  averageExecutionTimeMs: number;
  lastExecutionAt?: Date;
}

export type ExecutionStep =
  | 'start'
  | 'tool_found'
  | 'tool_not_found'
  | 'execution_start'
  | 'execution_success'
  | 'execution_timeout'
  | 'execution_error';

export interface ExecutionLogEntry {
  executionId: ExecutionId;
  step: ExecutionStep;
  timestamp: Date;
  payload: Record<string, unknown>;
}

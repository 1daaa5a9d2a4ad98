/**
 * Base error class for the orchestration core.
 * Extends Error with a machine-readable code, HTTP status, and structured context.
 */
export class OrchestratorError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    statusCode?: number;
    cause?: Error;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'OrchestratorError';
    this.code = params.code;
    this.statusCode = params.statusCode ?? 500;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

// ─── Error Kinds ────────────────────────────────────────────────

/** Kinds carried in the payload of `error` messages and failed tool results. */
export type ErrorKind =
  | 'NoAgentsAvailable'
  | 'MessageDeliveryError'
  | 'ToolNotFound'
  | 'ToolTimeout'
  | 'ToolExecutionError'
  | 'AgentRequestError'
  | 'QueryProcessingError'
  | 'MessageProcessingError';

// ─── Routing ────────────────────────────────────────────────────

/** Thrown when no registered agent covers the capabilities a query needs. */
export class NoAgentsAvailableError extends OrchestratorError {
  constructor(requiredCapabilities: string[]) {
    super({
      message: 'No agents available with required capabilities',
      code: 'NO_AGENTS_AVAILABLE',
      statusCode: 503,
      context: { requiredCapabilities },
    });
    this.name = 'NoAgentsAvailableError';
  }
}

/** Thrown when the bus cannot route a message (unknown recipient or bus stopped). */
export class MessageDeliveryError extends OrchestratorError {
  constructor(messageId: string, reason: string, recipientId?: string) {
    super({
      message: `Message "${messageId}" could not be delivered: ${reason}`,
      code: 'MESSAGE_DELIVERY_ERROR',
      statusCode: 502,
      context: { messageId, recipientId },
    });
    this.name = 'MessageDeliveryError';
  }
}

/** Catch-all for failures while an agent handles an incoming message. */
export class MessageProcessingError extends OrchestratorError {
  constructor(agentId: string, message: string, cause?: Error) {
    super({
      message,
      code: 'MESSAGE_PROCESSING_ERROR',
      statusCode: 500,
      cause,
      context: { agentId },
    });
    this.name = 'MessageProcessingError';
  }
}

/** Catch-all for failures while the coordinator processes a user query. */
export class QueryProcessingError extends OrchestratorError {
  constructor(conversationId: string, message: string, cause?: Error) {
    super({
      message,
      code: 'QUERY_PROCESSING_ERROR',
      statusCode: 500,
      cause,
      context: { conversationId },
    });
    this.name = 'QueryProcessingError';
  }
}

/** Thrown when an agent-to-agent request cannot be served. */
export class AgentRequestError extends OrchestratorError {
  constructor(agentId: string, message: string, cause?: Error) {
    super({
      message,
      code: 'AGENT_REQUEST_ERROR',
      statusCode: 500,
      cause,
      context: { agentId },
    });
    this.name = 'AgentRequestError';
  }
}

// ─── Tasks ──────────────────────────────────────────────────────

/** Returned when waiting on a task or a reply exceeds its deadline. */
export class TaskTimeoutError extends OrchestratorError {
  constructor(taskId: string, timeoutMs: number) {
    super({
      message: `Task "${taskId}" timed out after ${String(timeoutMs)}ms`,
      code: 'TASK_TIMEOUT',
      statusCode: 504,
      context: { taskId, timeoutMs },
    });
    this.name = 'TaskTimeoutError';
  }
}

/** Returned when a task or pending reply is abandoned because its owner stopped. */
export class TaskCancelledError extends OrchestratorError {
  constructor(taskId: string) {
    super({
      message: `Task "${taskId}" was cancelled`,
      code: 'TASK_CANCELLED',
      statusCode: 499,
      context: { taskId },
    });
    this.name = 'TaskCancelledError';
  }
}

// ─── Tools ──────────────────────────────────────────────────────

/** Thrown when a tool name does not resolve to anything the provider exposes. */
export class ToolNotFoundError extends OrchestratorError {
  constructor(toolName: string) {
    super({
      message: `Tool "${toolName}" not found`,
      code: 'TOOL_NOT_FOUND',
      statusCode: 404,
      context: { toolName },
    });
    this.name = 'ToolNotFoundError';
  }
}

/** Thrown when a tool call exceeds its hard timeout. */
export class ToolTimeoutError extends OrchestratorError {
  constructor(toolName: string, timeoutMs: number) {
    super({
      message: `Tool "${toolName}" timed out after ${String(timeoutMs)}ms`,
      code: 'TOOL_TIMEOUT',
      statusCode: 504,
      context: { toolName, timeoutMs },
    });
    this.name = 'ToolTimeoutError';
  }
}

/** Thrown when a tool's execute() fails at runtime. */
export class ToolExecutionError extends OrchestratorError {
  constructor(toolName: string, message: string, cause?: Error) {
    super({
      message: `Tool "${toolName}" execution failed: ${message}`,
      code: 'TOOL_EXECUTION_ERROR',
      statusCode: 500,
      cause,
      context: { toolName },
    });
    this.name = 'ToolExecutionError';
  }
}

// ─── Collaborators ──────────────────────────────────────────────

/** Thrown when a model backend call fails. */
export class ProviderError extends OrchestratorError {
  constructor(provider: string, message: string, cause?: Error) {
    super({
      message: `Model backend "${provider}" error: ${message}`,
      code: 'PROVIDER_ERROR',
      statusCode: 502,
      cause,
      context: { provider },
    });
    this.name = 'ProviderError';
  }
}

/** Thrown when input validation (Zod) fails. */
export class ValidationError extends OrchestratorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ValidationError';
  }
}

// ─── Helpers ────────────────────────────────────────────────────

/** Extract a printable message from anything that was thrown. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Normalize a thrown value into an Error instance. */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

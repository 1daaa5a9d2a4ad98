/**
 * Constructors for each message type. Fill the envelope defaults
 * (id, status, priority, timestamp) and derive `content` from the payload.
 */
import { nanoid } from 'nanoid';

import type { ErrorKind } from '@/core/errors.js';
import type { ConversationId, MessageId } from '@/core/types.js';
import type {
  AgentRequestMessage,
  AgentResponseMessage,
  CoordinationMessage,
  ErrorMessage,
  Message,
  MessagePriority,
  StatusMessage,
  ToolRequestMessage,
  ToolResultMessage,
  UserQueryMessage,
} from './types.js';

// ─── Envelope ───────────────────────────────────────────────────

export interface MessageInit {
  senderId: string;
  recipientId?: string;
  priority?: MessagePriority;
  parentMessageId?: MessageId;
  conversationId?: ConversationId;
  /**
   * The message being answered. Supplies `recipientId`, `parentMessageId`
   * and `conversationId` unless they are given explicitly.
   */
  inReplyTo?: Message;
}

/** Generate a new message id. */
export function createMessageId(): MessageId {
  return nanoid() as MessageId;
}

/** Generate a new conversation id. */
export function createConversationId(): ConversationId {
  return nanoid() as ConversationId;
}

function envelope(init: MessageInit, defaultPriority: MessagePriority = 'normal') {
  const replyTo = init.inReplyTo;
  return {
    id: createMessageId(),
    senderId: init.senderId,
    recipientId: init.recipientId ?? replyTo?.senderId,
    priority: init.priority ?? defaultPriority,
    status: 'pending' as const,
    timestamp: new Date(),
    parentMessageId: init.parentMessageId ?? replyTo?.id,
    conversationId: init.conversationId ?? replyTo?.conversationId,
  };
}

/** Render an arbitrary tool or agent value as message text. */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return '';
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

// ─── Factories ──────────────────────────────────────────────────

export function createUserQueryMessage(
  init: MessageInit & { userId: string; query: string; context?: Record<string, unknown> },
): UserQueryMessage {
  return {
    ...envelope(init),
    type: 'user_query',
    content: init.query,
    payload: { userId: init.userId, query: init.query, context: init.context ?? {} },
  };
}

export function createAgentRequestMessage(
  init: MessageInit & {
    requestedCapability: string;
    taskDescription: string;
    requiredTools?: string[];
    expectedOutputFormat?: string;
  },
): AgentRequestMessage {
  return {
    ...envelope(init),
    type: 'agent_request',
    content: init.taskDescription,
    payload: {
      requestedCapability: init.requestedCapability,
      taskDescription: init.taskDescription,
      requiredTools: init.requiredTools ?? [],
      expectedOutputFormat: init.expectedOutputFormat,
    },
  };
}

export function createAgentResponseMessage(
  init: MessageInit & {
    result: string;
    confidence: number;
    toolsUsed?: string[];
    executionTimeMs?: number;
  },
): AgentResponseMessage {
  return {
    ...envelope(init),
    type: 'agent_response',
    content: init.result,
    payload: {
      result: init.result,
      confidence: init.confidence,
      toolsUsed: init.toolsUsed ?? [],
      executionTimeMs: init.executionTimeMs,
    },
  };
}

export function createToolRequestMessage(
  init: MessageInit & {
    toolName: string;
    parameters?: Record<string, unknown>;
    timeoutMs?: number;
  },
): ToolRequestMessage {
  return {
    ...envelope(init),
    type: 'tool_request',
    content: `Execute tool: ${init.toolName}`,
    payload: {
      toolName: init.toolName,
      parameters: init.parameters ?? {},
      timeoutMs: init.timeoutMs,
    },
  };
}

export function createToolResultMessage(
  init: MessageInit & {
    toolName: string;
    success: boolean;
    result: unknown;
    error?: string;
    executionTimeMs?: number;
  },
): ToolResultMessage {
  return {
    ...envelope(init),
    type: 'tool_result',
    content: init.success
      ? formatValue(init.result)
      : `Tool execution failed: ${init.error ?? 'unknown error'}`,
    payload: {
      toolName: init.toolName,
      success: init.success,
      result: init.result,
      error: init.error,
      executionTimeMs: init.executionTimeMs,
    },
  };
}

export function createCoordinationMessage(
  init: MessageInit & {
    coordinationType: string;
    action: string;
    parameters?: Record<string, unknown>;
  },
): CoordinationMessage {
  return {
    ...envelope(init),
    type: 'coordination',
    content: `Coordination: ${init.coordinationType} - ${init.action}`,
    payload: {
      coordinationType: init.coordinationType,
      action: init.action,
      parameters: init.parameters ?? {},
    },
  };
}

/** Error messages default to high priority; `content` is `"{errorType}: {errorDetails}"`. */
export function createErrorMessage(
  init: MessageInit & { errorType: ErrorKind; errorDetails: string; stackTrace?: string },
): ErrorMessage {
  return {
    ...envelope(init, 'high'),
    type: 'error',
    content: `${init.errorType}: ${init.errorDetails}`,
    payload: {
      errorType: init.errorType,
      errorDetails: init.errorDetails,
      stackTrace: init.stackTrace,
    },
  };
}

export function createStatusMessage(
  init: MessageInit & { agentId: string; state: string; details?: Record<string, unknown> },
): StatusMessage {
  return {
    ...envelope(init, 'low'),
    type: 'status',
    content: `Status: ${init.agentId} is ${init.state}`,
    payload: { agentId: init.agentId, state: init.state, details: init.details ?? {} },
  };
}

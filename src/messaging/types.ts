/**
 * Message model for the in-process bus.
 * Each message type carries its own payload shape, keyed by `type`.
 */
import type { ErrorKind } from '@/core/errors.js';
import type { ConversationId, MessageId } from '@/core/types.js';

// ─── Enumerations ───────────────────────────────────────────────

export const MESSAGE_TYPES = [
  'user_query',
  'agent_request',
  'agent_response',
  'tool_request',
  'tool_result',
  'coordination',
  'error',
  'status',
] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

export type MessagePriority = 'low' | 'normal' | 'high' | 'urgent';

/** `pending → processing → completed | failed | cancelled` */
export type MessageStatus = 'pending' | 'processing' | 'completed' | 'failed' | 'cancelled';

export const TERMINAL_STATUSES: ReadonlySet<MessageStatus> = new Set([
  'completed',
  'failed',
  'cancelled',
]);

// ─── Payloads ───────────────────────────────────────────────────

export interface UserQueryPayload {
  userId: string;
  query: string;
  context: Record<string, unknown>;
}

export interface AgentRequestPayload {
  /** A capability tag, or `general_assistance` for open-ended delegation. */
  requestedCapability: string;
  taskDescription: string;
  requiredTools: string[];
  expectedOutputFormat?: string;
}

export interface AgentResponsePayload {
  result: string;
  confidence: number;
  toolsUsed: string[];
  executionTimeMs?: number;
}

export interface ToolRequestPayload {
  toolName: string;
  parameters: Record<string, unknown>;
  timeoutMs?: number;
}

export interface ToolResultPayload {
  toolName: string;
  success: boolean;
  result: unknown;
  error?: string;
  executionTimeMs?: number;
}

export interface CoordinationPayload {
  coordinationType: string;
  action: string;
  parameters: Record<string, unknown>;
}

export interface ErrorPayload {
  errorType: ErrorKind;
  errorDetails: string;
  stackTrace?: string;
}

export interface StatusPayload {
  agentId: string;
  state: string;
  details: Record<string, unknown>;
}

// ─── Envelope ───────────────────────────────────────────────────

interface MessageEnvelope<T extends MessageType, P> {
  readonly id: MessageId;
  readonly type: T;
  readonly senderId: string;
  /** Absent means the bus broadcasts the message. */
  readonly recipientId?: string;
  readonly content: string;
  readonly payload: P;
  readonly priority: MessagePriority;
  /** The only field the bus mutates after creation. */
  status: MessageStatus;
  readonly timestamp: Date;
  readonly parentMessageId?: MessageId;
  readonly conversationId?: ConversationId;
}

export type UserQueryMessage = MessageEnvelope<'user_query', UserQueryPayload>;
export type AgentRequestMessage = MessageEnvelope<'agent_request', AgentRequestPayload>;
export type AgentResponseMessage = MessageEnvelope<'agent_response', AgentResponsePayload>;
export type ToolRequestMessage = MessageEnvelope<'tool_request', ToolRequestPayload>;
export type ToolResultMessage = MessageEnvelope<'tool_result', ToolResultPayload>;
export type CoordinationMessage = MessageEnvelope<'coordination', CoordinationPayload>;
export type ErrorMessage = MessageEnvelope<'error', ErrorPayload>;
export type StatusMessage = MessageEnvelope<'status', StatusPayload>;

export type Message =
  | UserQueryMessage
  | AgentRequestMessage
  | AgentResponseMessage
  | ToolRequestMessage
  | ToolResultMessage
  | CoordinationMessage
  | ErrorMessage
  | StatusMessage;

// ─── Bus Contracts ──────────────────────────────────────────────

/** Callback a handler registers to receive its messages. */
export type MessageHandler = (message: Message) => Promise<void> | void;

export interface HistoryFilter {
  /** Matches messages sent by or addressed to this handler. */
  handlerId?: string;
  type?: MessageType;
  limit?: number;
}

export interface HandlerStats {
  isActive: boolean;
  broadcastOnly: boolean;
  messageCount: number;
  lastActivity?: Date;
  queueSize: number;
}

export interface BusStats {
  isRunning: boolean;
  totalHandlers: number;
  activeHandlers: number;
  totalMessages: number;
  historySize: number;
  queueSizes: Record<string, number>;
}

export interface MessageBus {
  start(): void;
  stop(): Promise<void>;
  isRunning(): boolean;
  registerHandler(handlerId: string, handler: MessageHandler): boolean;
  registerBroadcastHandler(handlerId: string, handler: MessageHandler): boolean;
  unregisterHandler(handlerId: string): boolean;
  hasHandler(handlerId: string): boolean;
  sendMessage(message: Message): Promise<boolean>;
  broadcastMessage(message: Message): Promise<boolean>;
  getMessageHistory(filter?: HistoryFilter): Message[];
  getHandlerStats(): Record<string, HandlerStats>;
  getBusStats(): BusStats;
}

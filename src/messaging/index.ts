// Messaging — typed messages, bounded queues, and the in-process bus
export type {
  AgentRequestMessage,
  AgentRequestPayload,
  AgentResponseMessage,
  AgentResponsePayload,
  BusStats,
  CoordinationMessage,
  CoordinationPayload,
  ErrorMessage,
  ErrorPayload,
  HandlerStats,
  HistoryFilter,
  Message,
  MessageBus,
  MessageHandler,
  MessagePriority,
  MessageStatus,
  MessageType,
  StatusMessage,
  StatusPayload,
  ToolRequestMessage,
  ToolRequestPayload,
  ToolResultMessage,
  ToolResultPayload,
  UserQueryMessage,
  UserQueryPayload,
} from './types.js';
export { MESSAGE_TYPES, TERMINAL_STATUSES } from './types.js';

export type { MessageInit } from './message-factory.js';
export {
  createAgentRequestMessage,
  createAgentResponseMessage,
  createConversationId,
  createCoordinationMessage,
  createErrorMessage,
  createMessageId,
  createStatusMessage,
  createToolRequestMessage,
  createToolResultMessage,
  createUserQueryMessage,
  formatValue,
} from './message-factory.js';

export type { BoundedQueue } from './message-queue.js';
export { createBoundedQueue } from './message-queue.js';

export type { MessageBusOptions } from './message-bus.js';
export { createMessageBus } from './message-bus.js';

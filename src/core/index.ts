// Core module — shared ids, Result type, error hierarchy, timing helpers
export type { ConversationId, ExecutionId, MessageId, TaskId } from './types.js';

export type { Result } from './result.js';
export { ok, err, isOk, isErr, unwrap, settle } from './result.js';

export type { ErrorKind } from './errors.js';
export {
  OrchestratorError,
  NoAgentsAvailableError,
  MessageDeliveryError,
  MessageProcessingError,
  QueryProcessingError,
  AgentRequestError,
  TaskTimeoutError,
  TaskCancelledError,
  ToolNotFoundError,
  ToolTimeoutError,
  ToolExecutionError,
  ProviderError,
  ValidationError,
  errorMessage,
  toError,
} from './errors.js';

export type { TimedOutcome } from './async.js';
export { raceWithTimeout, whenAborted, delay } from './async.js';

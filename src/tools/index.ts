// Tool system — provider contract, registry, execution records and definitions
export type {
  ExecutableTool,
  ExecutionLogEntry,
  ExecutionStep,
  ToolCallable,
  ToolContext,
  ToolDefinition,
  ToolDescriptor,
  ToolExecutionResult,
  ToolExecutionStats,
  ToolFailureKind,
  ToolProvider,
} from './types.js';

export { createToolRegistry, toParameterSchema } from './registry/tool-registry.js';
export type { ToolRegistry, ToolRegistryOptions } from './registry/tool-registry.js';

export { createToolStatsTracker } from './execution-stats.js';
export type { ToolStatsTracker } from './execution-stats.js';
export { createExecutionLog, truncateForLog, MAX_LOGGED_RESULT_LENGTH } from './execution-log.js';
export type { ExecutionLog } from './execution-log.js';

export { createMathTool, evaluateExpression } from './definitions/index.js';

/**
 * Agents
 *
 * Agent base class, the coordinator and tool executor, and the registry,
 * classifier and selector they are built from.
 */

// ─── Types ───────────────────────────────────────────────────────

export type {
  AgentCapability,
  AgentLifecycleState,
  AgentProfile,
  AgentRegistry,
  AgentRole,
  AgentStatus,
  CapabilityClassifier,
  ToolSelector,
} from './types.js';
export { AGENT_CAPABILITIES, AGENT_ROLES, isAgentCapability, isAgentRole } from './types.js';

// ─── Agents ──────────────────────────────────────────────────────

export type { AgentDeps, BaseAgentOptions } from './base-agent.js';
export { BaseAgent } from './base-agent.js';

export type {
  AgentContribution,
  ConversationState,
  ConversationStatus,
  ConversationSummary,
  CoordinatorAgentOptions,
} from './coordinator-agent.js';
export {
  COORDINATOR_ID,
  CoordinatorAgent,
  buildSynthesisPrompt,
  fallbackSynthesis,
} from './coordinator-agent.js';

export type { ToolExecutorAgentOptions, ToolListChange } from './tool-executor-agent.js';
export { TOOL_EXECUTOR_ID, ToolExecutorAgent, synthesizeToolResults } from './tool-executor-agent.js';

// ─── Factory Functions ───────────────────────────────────────────

export { createAgentRegistry } from './agent-registry.js';
export { CAPABILITY_KEYWORDS, createKeywordClassifier, matchCapabilities } from './capability-classifier.js';
export { createKeywordToolSelector, extractExpression, extractSearchQuery } from './tool-selector.js';

export type { TaskHandle, TaskPool, TaskPoolOptions, TaskWork } from './task-pool.js';
export { createTaskPool } from './task-pool.js';

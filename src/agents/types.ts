/**
 * Agent Types — roles, capabilities, profiles and status snapshots.
 */

// ─── Roles & Capabilities ────────────────────────────────────────

export const AGENT_ROLES = [
  'coordinator',
  'reasoner',
  'tool_executor',
  'memory_manager',
  'privacy_guardian',
  'researcher',
  'calculator',
  'coder',
] as const;

export type AgentRole = (typeof AGENT_ROLES)[number];

/** Skill tags an agent advertises; the coordinator routes on these. */
export const AGENT_CAPABILITIES = [
  'reasoning',
  'tool_calling',
  'math',
  'search',
  'weather',
  'code_execution',
  'memory',
  'privacy',
  'research',
] as const;

export type AgentCapability = (typeof AGENT_CAPABILITIES)[number];

export function isAgentCapability(value: string): value is AgentCapability {
  return AGENT_CAPABILITIES.some((capability) => capability === value);
}

export function isAgentRole(value: string): value is AgentRole {
  return AGENT_ROLES.some((role) => role === value);
}

// ─── Profile ─────────────────────────────────────────────────────

/**
 * Live description of an agent. The owning agent mutates `isActive` and
 * `lastActivity`; the registry holds the same object.
 */
export interface AgentProfile {
  readonly agentId: string;
  readonly name: string;
  readonly role: AgentRole;
  readonly capabilities: readonly AgentCapability[];
  readonly description: string;
  readonly modelName?: string;
  isActive: boolean;
  readonly createdAt: Date;
  lastActivity?: Date;
}

// ─── Lifecycle ───────────────────────────────────────────────────

export type AgentLifecycleState = 'uninitialized' | 'initialized' | 'active' | 'stopped';

export interface AgentStatus {
  agentId: string;
  name: string;
  role: AgentRole;
  state: AgentLifecycleState;
  isActive: boolean;
  capabilities: AgentCapability[];
  activeTasks: number;
  pendingReplies: number;
  inFlightMessages: number;
  uptimeMs: number;
  lastActivity?: Date;
}

// ─── Registry ────────────────────────────────────────────────────

export interface AgentRegistry {
  /** Register a profile. Returns false (and keeps the existing one) on a duplicate id. */
  register(profile: AgentProfile): boolean;
  unregister(agentId: string): boolean;
  get(agentId: string): AgentProfile | undefined;
  has(agentId: string): boolean;
  list(): AgentProfile[];
  listByRole(role: AgentRole): AgentProfile[];
  listByCapability(capability: AgentCapability): AgentProfile[];
  listActive(): AgentProfile[];
  /** Active agents advertising any of `capabilities`, in registration order. */
  findByCapabilities(capabilities: readonly AgentCapability[]): AgentProfile[];
  /** Mark an agent as just seen. Returns false for unknown ids. */
  touch(agentId: string, at?: Date): boolean;
  readonly size: number;
}

// ─── Classification ──────────────────────────────────────────────

/** Maps free query text to the capabilities needed to answer it. */
export interface CapabilityClassifier {
  classify(query: string): Promise<AgentCapability[]> | AgentCapability[];
}

/** Picks tools for a task and derives each tool's parameters from the task text. */
export interface ToolSelector {
  selectTools(task: string, requiredTools: readonly string[], availableTools: readonly string[]): string[];
  extractParameters(task: string, toolName: string): Record<string, unknown>;
}

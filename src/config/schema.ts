/**
 * Zod schemas for validating orchestrator configuration files.
 * Every field has a default, so an empty object is a complete configuration.
 */
import { z } from 'zod';

// ─── Agents ─────────────────────────────────────────────────────

export const agentsConfigSchema = z.object({
  coordinatorId: z.string().min(1).default('coordinator_001'),
  toolExecutorId: z.string().min(1).default('tool_executor_001'),
  maxConcurrentTasks: z.number().int().positive().max(100).default(5),
});

// ─── Message Bus ────────────────────────────────────────────────

/**
 * Per-handler queues are bounded; a sender waits for room when the
 * recipient's queue is full.
 */
export const busConfigSchema = z.object({
  historySize: z.number().int().positive().default(1000),
  queueCapacity: z.number().int().positive().default(1000),
  pollIntervalMs: z.number().int().positive().default(1000),
});

// ─── Coordinator ────────────────────────────────────────────────

export const coordinatorConfigSchema = z.object({
  delegationTimeoutMs: z.number().int().positive().default(30_000),
  healthCheckIntervalMs: z.number().int().positive().default(60_000),
  inactivityThresholdMs: z.number().int().positive().default(300_000),
  conversationRetentionMs: z.number().int().positive().default(3_600_000),
  cleanupIntervalMs: z.number().int().positive().default(300_000),
});

// ─── Tool Executor ──────────────────────────────────────────────

export const toolExecutorConfigSchema = z.object({
  defaultToolTimeoutMs: z.number().int().positive().default(30_000),
  toolHealthCheckIntervalMs: z.number().int().positive().default(60_000),
  executionLogSize: z.number().int().positive().default(1000),
});

// ─── Model Backend ──────────────────────────────────────────────

/**
 * Schema for the model backend used for synthesis.
 * `none` runs the system on deterministic fallback synthesis only.
 */
export const modelBackendConfigSchema = z.object({
  provider: z.enum(['none', 'openai', 'anthropic', 'ollama']).default('none'),
  model: z.string().min(1, 'Model identifier cannot be empty').default('gpt-4o-mini'),
  temperature: z.number().min(0).max(2).optional(),
  maxOutputTokens: z.number().int().positive().optional(),
  /** References an env var name, never the raw key. */
  apiKeyEnvVar: z.string().min(1).optional(),
  baseUrl: z.string().url('Invalid base URL format').optional(),
});

// ─── HTTP Server ────────────────────────────────────────────────

export const serverConfigSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: z.number().int().min(1).max(65_535).default(3000),
});

// ─── Root ───────────────────────────────────────────────────────

export const orchestratorConfigSchema = z.object({
  agents: agentsConfigSchema.default({}),
  bus: busConfigSchema.default({}),
  coordinator: coordinatorConfigSchema.default({}),
  toolExecutor: toolExecutorConfigSchema.default({}),
  modelBackend: modelBackendConfigSchema.default({}),
  server: serverConfigSchema.default({}),
});

export type OrchestratorConfig = z.infer<typeof orchestratorConfigSchema>;
export type ModelBackendConfig = z.infer<typeof modelBackendConfigSchema>;

// ─── Schemas ────────────────────────────────────────────────────
export type { OrchestratorConfig, ModelBackendConfig } from './schema.js';
export {
  agentsConfigSchema,
  busConfigSchema,
  coordinatorConfigSchema,
  modelBackendConfigSchema,
  orchestratorConfigSchema,
  serverConfigSchema,
  toolExecutorConfigSchema,
} from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export { ConfigError, defaultConfig, loadOrchestratorConfig, resolveEnvVars } from './loader.js';

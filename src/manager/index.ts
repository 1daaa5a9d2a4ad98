// Process-level facade over the bus and the agents
export type {
  MultiAgentManager,
  MultiAgentManagerDeps,
  PerformanceMetrics,
  QueryStatistics,
  SystemStatus,
} from './multi-agent-manager.js';
export { NOT_RUNNING_RESPONSE, createMultiAgentManager } from './multi-agent-manager.js';

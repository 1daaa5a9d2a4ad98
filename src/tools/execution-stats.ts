/**
 * Per-tool execution statistics. Every recorded outcome, successful or not,
 * lands in exactly one of the success/failure counters.
 */
import type { ToolExecutionStats } from './types.js';

export interface ToolStatsTracker {
  /** Record one finished attempt, including its elapsed time. */
  record(toolName: string, success: boolean, executionTimeMs: number, at?: Date): void;
  get(toolName: string): ToolExecutionStats | undefined;
  getAll(): Record<string, ToolExecutionStats>;
}

export function createToolStatsTracker(): ToolStatsTracker {
  const stats = new Map<string, ToolExecutionStats>();

  return {
    record(toolName, success, executionTimeMs, at = new Date()): void {
      const current = stats.get(toolName) ?? {
        totalExecutions: 0,
        successfulExecutions: 0,
        failedExecutions: 0,
        totalExecutionTimeMs: 0,
        averageExecutionTimeMs: 0,
      };

      const totalExecutions = current.totalExecutions + 1;
      const totalExecutionTimeMs = current.totalExecutionTimeMs + executionTimeMs;

      stats.set(toolName, {
        totalExecutions,
        successfulExecutions: current.successfulExecutions + (success ? 1 : 0),
        failedExecutions: current.failedExecutions + (success ? 0 : 1),
        totalExecutionTimeMs,
        averageExecutionTimeMs: totalExecutionTimeMs / totalExecutions,
        lastExecutionAt: at,
      });
    },

    get(toolName): ToolExecutionStats | undefined {
      const entry = stats.get(toolName);
      return entry ? { ...entry } : undefined;
    },

    getAll(): Record<string, ToolExecutionStats> {
      const all: Record<string, ToolExecutionStats> = {};
      for (const [toolName, entry] of stats) {
        all[toolName] = { ...entry };
      }
      return all;
    },
  };
}

/**
 * Bounded, step-by-step log of tool executions. Observability only.
 */
import type { ExecutionId } from '@/core/types.js';
import type { ExecutionLogEntry, ExecutionStep } from './types.js';

export const MAX_LOGGED_RESULT_LENGTH = 500;

export interface ExecutionLog {
  append(executionId: ExecutionId, step: ExecutionStep, payload?: Record<string, unknown>): void;
  /** Most recent `limit` entries, oldest first. */
  recent(limit?: number): ExecutionLogEntry[];
  readonly size: number;
}

/** Cut rendered text down to the logged length. */
export function truncateForLog(text: string, maxLength = MAX_LOGGED_RESULT_LENGTH): string {
  return text.length > maxLength ? text.slice(0, maxLength) : text;
}

export function createExecutionLog(capacity = 1000): ExecutionLog {
  const entries: ExecutionLogEntry[] = [];

  return {
    append(executionId, step, payload = {}): void {
      entries.push({ executionId, step, timestamp: new Date(), payload });
      if (entries.length > capacity) {
        entries.splice(0, entries.length - capacity);
      }
    },

    recent(limit = 100): ExecutionLogEntry[] {
      return limit > 0 ? entries.slice(-limit) : [];
    },

    get size(): number {
      return entries.length;
    },
  };
}

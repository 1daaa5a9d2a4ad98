/**
 * Task Pool — bounded set of cancellable background tasks owned by one agent.
 *
 * `spawn` waits for a free slot when the pool is full. Each task gets an
 * AbortSignal; cancelling settles the task as TaskCancelledError right away,
 * whether or not the work itself honors the signal.
 */
import { nanoid } from 'nanoid';

import { raceWithTimeout, whenAborted } from '@/core/async.js';
import {
  OrchestratorError,
  TaskCancelledError,
  TaskTimeoutError,
  errorMessage,
  toError,
} from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { TaskId } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';

// ─── Types ───────────────────────────────────────────────────────

export type TaskWork<T> = (signal: AbortSignal) => Promise<T>;

export interface TaskHandle<T> {
  readonly id: TaskId;
  /** Resolves once the task finishes, fails or is cancelled. Never rejects. */
  readonly settled: Promise<Result<T, OrchestratorError>>;
}

export interface TaskPool {
  spawn<T>(work: TaskWork<T>): Promise<TaskHandle<T>>;
  /** Await a task; on timeout the task is cancelled and a TaskTimeoutError returned. */
  wait<T>(handle: TaskHandle<T>, timeoutMs?: number): Promise<Result<T, OrchestratorError>>;
  cancel(taskId: TaskId): boolean;
  /** Cancel every running task. Returns how many were cancelled. */
  cancelAll(): number;
  readonly activeCount: number;
  readonly maxConcurrent: number;
}

export interface TaskPoolOptions {
  maxConcurrent: number;
  ownerId: string;
  logger: Logger;
}

interface RunningTask {
  controller: AbortController;
  done: Promise<unknown>;
}

// ─── Factory Function ────────────────────────────────────────────

function toOrchestratorError(ownerId: string, error: unknown): OrchestratorError {
  if (error instanceof OrchestratorError) return error;
  return new OrchestratorError({
    message: errorMessage(error),
    code: 'TASK_FAILED',
    cause: toError(error),
    context: { ownerId },
  });
}

export function createTaskPool(options: TaskPoolOptions): TaskPool {
  const { maxConcurrent, ownerId, logger } = options;
  if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
    throw new RangeError(`maxConcurrent must be a positive integer, got ${String(maxConcurrent)}`);
  }

  const running = new Map<TaskId, RunningTask>();

  async function run<T>(
    id: TaskId,
    work: TaskWork<T>,
    signal: AbortSignal,
  ): Promise<Result<T, OrchestratorError>> {
    try {
      const outcome = await Promise.race([
        work(signal).then((value) => ({ cancelled: false as const, value })),
        whenAborted(signal).then(() => ({ cancelled: true as const })),
      ]);
      if (outcome.cancelled) return err(new TaskCancelledError(id));
      return ok(outcome.value);
    } catch (error) {
      if (signal.aborted) return err(new TaskCancelledError(id));
      logger.warn('Task failed', {
        component: 'task-pool',
        agentId: ownerId,
        taskId: id,
        error: errorMessage(error),
      });
      return err(toOrchestratorError(ownerId, error));
    } finally {
      running.delete(id);
    }
  }

  const pool: TaskPool = {
    async spawn<T>(work: TaskWork<T>): Promise<TaskHandle<T>> {
      // The slot is claimed in the same turn the check passes.
      while (running.size >= maxConcurrent) {
        await Promise.race([...running.values()].map((task) => task.done));
      }

      const id = nanoid() as TaskId;
      const task: RunningTask = { controller: new AbortController(), done: Promise.resolve() };
      running.set(id, task);
      const settled = run(id, work, task.controller.signal);
      task.done = settled;

      logger.debug('Task spawned', {
        component: 'task-pool',
        agentId: ownerId,
        taskId: id,
        activeTasks: running.size,
      });
      return { id, settled };
    },

    async wait<T>(handle: TaskHandle<T>, timeoutMs?: number): Promise<Result<T, OrchestratorError>> {
      if (timeoutMs === undefined) return handle.settled;

      const outcome = await raceWithTimeout(handle.settled, timeoutMs);
      if (!outcome.timedOut) return outcome.value;

      pool.cancel(handle.id);
      logger.warn('Task timed out', {
        component: 'task-pool',
        agentId: ownerId,
        taskId: handle.id,
        timeoutMs,
      });
      return err(new TaskTimeoutError(handle.id, timeoutMs));
    },

    cancel(taskId: TaskId): boolean {
      const task = running.get(taskId);
      if (!task) return false;
      task.controller.abort();
      return true;
    },

    cancelAll(): number {
      const tasks = [...running.values()];
      for (const task of tasks) task.controller.abort();
      if (tasks.length > 0) {
        logger.info('Cancelled running tasks', {
          component: 'task-pool',
          agentId: ownerId,
          cancelled: tasks.length,
        });
      }
      return tasks.length;
    },

    get activeCount(): number {
      return running.size;
    },

    get maxConcurrent(): number {
      return maxConcurrent;
    },
  };

  return pool;
}

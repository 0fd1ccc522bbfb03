/**
 * Background task manager — tracks fire-and-forget work owned by an agent
 * and guarantees it is cancelled and awaited during teardown.
 */
import { nanoid } from 'nanoid';
import { CancelledError, isCancellationError, waitAtMost } from '@/core/cancellation.js';
import { toError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';

// ─── Types ──────────────────────────────────────────────────────

export type TaskStatus = 'running' | 'completed' | 'failed' | 'cancelled';

/** How a task ended. `settled` resolves with this and never rejects. */
export type TaskOutcome<T = unknown> =
  | { readonly status: 'completed'; readonly value: T }
  | { readonly status: 'failed'; readonly error: Error }
  | { readonly status: 'cancelled' };

/** Work receives a signal that aborts when the task is cancelled. */
export type TaskWork<T> = (signal: AbortSignal) => Promise<T> | T;

export interface TaskHandle<T = unknown> {
  readonly id: string;
  readonly name: string;
  readonly status: TaskStatus;
  readonly signal: AbortSignal;
  readonly settled: Promise<TaskOutcome<T>>;
  /** Request cancellation. Does not wait; await `settled` for that. */
  cancel(): void;
}

export interface SpawnOptions {
  /** Shown in logs. Defaults to `task-<n>`. */
  name?: string;
}

export interface BackgroundTaskManager {
  spawn<T>(work: TaskWork<T>, options?: SpawnOptions): TaskHandle<T>;
  /**
   * Cancel every tracked task and wait for each to settle. Tasks still running
   * after the grace period are abandoned. The set is empty afterwards.
   */
  cancelAll(): Promise<void>;
  /** Number of tracked (unsettled) tasks. */
  readonly size: number;
  list(): TaskHandle[];
}

export interface BackgroundTaskManagerOptions {
  logger: Logger;
  /** How long `cancelAll` waits for a cancelled task. Defaults to 5000. */
  cancelGraceMs?: number;
  /** Owning agent, for log context. */
  agentName?: string;
}

interface TrackedTask {
  handle: TaskHandle;
  abandon(): void;
}

// ─── Factory ────────────────────────────────────────────────────

/** Create a background task manager. */
export function createBackgroundTaskManager(options: BackgroundTaskManagerOptions): BackgroundTaskManager {
  const { logger, cancelGraceMs = 5_000, agentName } = options;
  const tasks = new Map<string, TrackedTask>();
  let sequence = 0;

  return {
    spawn<T>(work: TaskWork<T>, spawnOptions: SpawnOptions = {}): TaskHandle<T> {
      sequence++;
      const id = nanoid();
      const name = spawnOptions.name ?? `task-${sequence}`;
      const controller = new AbortController();
      const logContext = { component: 'background-tasks', agentName, taskId: id, taskName: name };

      let status: TaskStatus = 'running';
      let resolveSettled: (outcome: TaskOutcome<T>) => void = () => undefined;
      const settled = new Promise<TaskOutcome<T>>((resolve) => {
        resolveSettled = resolve;
      });

      function finish(outcome: TaskOutcome<T>): void {
        if (status !== 'running') return;
        status = outcome.status;
        tasks.delete(id);
        resolveSettled(outcome);
      }

      const handle: TaskHandle<T> = {
        id,
        name,
        get status() {
          return status;
        },
        signal: controller.signal,
        settled,
        cancel() {
          if (!controller.signal.aborted) {
            controller.abort(new CancelledError(`Background task "${name}" cancelled`));
          }
        },
      };

      tasks.set(id, {
        handle,
        abandon() {
          if (status !== 'running') return;
          logger.warn('Background task ignored cancellation and was abandoned', {
            ...logContext,
            event: 'task.abandoned',
            graceMs: cancelGraceMs,
          });
          finish({ status: 'cancelled' });
        },
      });

      logger.debug('Background task spawned', { ...logContext, event: 'task.spawned' });

      void Promise.resolve()
        .then(() => work(controller.signal))
        .then(
          (value) => {
            finish({ status: 'completed', value });
          },
          (error: unknown) => {
            if (isCancellationError(error, controller.signal)) {
              logger.debug('Background task cancelled', { ...logContext, event: 'task.cancelled' });
              finish({ status: 'cancelled' });
              return;
            }
            const cause = toError(error);
            const failure = { ...logContext, event: 'task.failed', error: cause.message };
            // After cancellation a stray error is teardown noise, not a task failure.
            if (controller.signal.aborted) {
              logger.warn('Background task failed during cancellation', failure);
            } else {
              logger.error('Background task failed', failure);
            }
            finish({ status: 'failed', error: cause });
          },
        );

      return handle;
    },

    async cancelAll() {
      const snapshot = [...tasks.values()];
      if (snapshot.length === 0) return;

      logger.debug('Cancelling background tasks', {
        component: 'background-tasks',
        agentName,
        event: 'tasks.cancelling',
        count: snapshot.length,
      });
      for (const task of snapshot) {
        task.handle.cancel();
      }

      await Promise.all(
        snapshot.map(async (task) => {
          const waited = await waitAtMost(task.handle.settled, cancelGraceMs);
          if (waited.timedOut) task.abandon();
        }),
      );
    },

    get size() {
      return tasks.size;
    },

    list() {
      return [...tasks.values()].map((task) => task.handle);
    },
  };
}

/**
 * Polling of long-running tasks until a condition on their status holds.
 */

import { TimeoutError, UnknownStatusError } from '../errors/categories.js';
import type { Logger } from '../observability/logging.js';
import { checkTransition, classifyStatus } from './state-machine.js';
import type { TaskSource } from './tasks-service.js';
import type { TaskCategory, TaskPredicate, TaskSnapshot } from './types.js';

export interface PollOptions {
  /**
   * Give up once this many milliseconds have passed since the first request.
   * Checked after each response, so `0` fails right after the first one.
   */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** When set, unknown codes and regressions are rejected with UnknownStatusError */
  category?: TaskCategory;
  /** Last code already observed for this task, for regression checks */
  previousStatus?: number;
  /** Called with every snapshot, before the predicate is evaluated */
  onUpdate?: (task: TaskSnapshot) => void;
}

/**
 * Re-queries a task until `predicate` holds.
 *
 * There is no sleep between cycles: the pace is set by the rate limiter of
 * the `tasks` category, which every status request passes through.
 */
export class TaskPoller {
  constructor(
    private readonly source: TaskSource,
    private readonly logger: Logger
  ) {}

  async pollUntil(taskId: string, predicate: TaskPredicate, options: PollOptions = {}): Promise<TaskSnapshot> {
    const { timeoutMs, signal, category, onUpdate } = options;
    const startedAt = Date.now();
    let previous = options.previousStatus;

    this.logger.debug('Polling task', { taskId, category, timeoutMs });

    for (;;) {
      signal?.throwIfAborted();

      const task = await this.source.getTask(taskId, signal);
      this.logger.info(`Task ${taskId} has status ${task.rawStatus}`);
      onUpdate?.(task);

      if (category) {
        if (classifyStatus(category, task.status) === 'unknown') {
          throw new UnknownStatusError(task, 'unrecognized');
        }
        if (checkTransition(category, previous, task.status) === 'regression') {
          throw new UnknownStatusError(task, 'regression', previous);
        }
      }
      previous = task.status;

      if (predicate(task)) {
        return task;
      }

      if (timeoutMs !== undefined) {
        const elapsed = Date.now() - startedAt;
        if (elapsed >= timeoutMs) {
          const error = new TimeoutError(task, timeoutMs, elapsed);
          this.logger.error(error.message, { taskId, status: task.status });
          throw error;
        }
      }
    }
  }
}

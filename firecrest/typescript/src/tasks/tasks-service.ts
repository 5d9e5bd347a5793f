import { RequestFailureError } from '../errors/categories.js';
import type { HttpTransport } from '../transport/http-transport.js';
import { tasksResponseSchema, toTaskSnapshot, type TaskSnapshot } from './types.js';

/**
 * Anything that can fetch the current state of a task
 */
export interface TaskSource {
  getTask(taskId: string, signal?: AbortSignal): Promise<TaskSnapshot>;
}

/**
 * Status queries against `/tasks`
 */
export class TasksService implements TaskSource {
  constructor(private readonly transport: HttpTransport) {}

  /**
   * Fetches one task; fails with RequestFailureError when the server does not know it
   */
  async getTask(taskId: string, signal?: AbortSignal): Promise<TaskSnapshot> {
    const tasks = await this.fetchTasks([taskId], signal);
    const task = tasks.get(taskId);
    if (!task) {
      throw new RequestFailureError(`Task ${taskId} is not in the /tasks response`, {
        status: 200,
        isRetryable: false,
      });
    }
    return task;
  }

  /**
   * Fetches the given tasks, or every task of the user when `taskIds` is empty.
   * Unknown ids are left out of the result.
   */
  async listTasks(taskIds: readonly string[] = [], signal?: AbortSignal): Promise<Map<string, TaskSnapshot>> {
    return this.fetchTasks(taskIds, signal);
  }

  private async fetchTasks(taskIds: readonly string[], signal?: AbortSignal): Promise<Map<string, TaskSnapshot>> {
    const response = await this.transport.request({
      method: 'GET',
      path: '/tasks',
      query: { tasks: taskIds.length > 0 ? taskIds.join(',') : undefined },
      expectedStatus: 200,
      signal,
    });

    const parsed = tasksResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new RequestFailureError('Unexpected /tasks response format', {
        status: response.status,
        responseBody: response.body,
        isRetryable: false,
        details: { issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`) },
      });
    }

    const result = new Map<string, TaskSnapshot>();
    for (const [id, record] of Object.entries(parsed.data.tasks)) {
      if (taskIds.length === 0 || taskIds.includes(id)) {
        result.set(id, toTaskSnapshot(id, record));
      }
    }
    return result;
  }
}

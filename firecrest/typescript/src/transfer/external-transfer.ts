/**
 * Lifecycle shared by staged uploads and downloads.
 */

import { InvalidStateError, RequestFailureError, TransferFailureError } from '../errors/categories.js';
import {
  dataReadyCode,
  isFailure,
  isTerminal,
  milestonePredicate,
  terminalPredicate,
} from '../tasks/state-machine.js';
import { taskCreatedSchema, type TaskCategory, type TaskSnapshot } from '../tasks/types.js';
import type { TransferContext, TransferDirection, TransferState, TransferWaitOptions } from './types.js';

export abstract class ExternalTransfer<TStagingData> {
  abstract readonly direction: TransferDirection;

  protected state: TransferState;
  protected stagingData?: TStagingData;
  private id?: string;
  private lastTask?: TaskSnapshot;

  protected constructor(
    protected readonly context: TransferContext,
    readonly machine: string,
    taskId?: string
  ) {
    this.id = taskId;
    this.state = taskId === undefined ? 'created' : 'staged';
  }

  protected abstract get category(): TaskCategory;

  protected abstract initiationPath(): string;

  protected abstract initiationFields(): Record<string, string>;

  /**
   * Extracts the object-storage data from a task at its data-ready code.
   * Fails when the payload is not in the expected shape.
   */
  protected abstract parseStagingData(task: TaskSnapshot): TStagingData;

  /** FirecREST task id; undefined until the transfer is initiated */
  get taskId(): string | undefined {
    return this.id;
  }

  get lifecycle(): TransferState {
    return this.state;
  }

  /** Last task state observed by any request of this object */
  get lastSnapshot(): TaskSnapshot | undefined {
    return this.lastTask;
  }

  /**
   * Creates the staging task. The server starts moving bytes right away.
   */
  async initiate(signal?: AbortSignal): Promise<string> {
    if (this.state !== 'created') {
      throw new InvalidStateError(`The ${this.direction} was already initiated as task ${this.id}`, this.state);
    }

    const response = await this.context.transport.request({
      method: 'POST',
      path: this.initiationPath(),
      headers: { 'X-Machine-Name': this.machine },
      body: { type: 'form', fields: this.initiationFields() },
      expectedStatus: 201,
      signal,
    });

    const created = taskCreatedSchema.safeParse(response.body);
    if (!created.success) {
      throw new RequestFailureError(`${this.initiationPath()} did not return a task id`, {
        status: response.status,
        responseBody: response.body,
        isRetryable: false,
      });
    }

    this.id = created.data.task_id;
    this.state = 'staged';
    this.context.logger.info(`Created external ${this.direction} for task ${this.id}`, { machine: this.machine });
    return this.id;
  }

  /**
   * Queries the task once and returns its raw status code.
   * Does not move the transfer forward; each call is one rate-limited request.
   */
  async status(signal?: AbortSignal): Promise<number> {
    return (await this.refresh(signal)).status;
  }

  /**
   * Queries the task once; false once the task reached a terminal code
   */
  async inProgress(signal?: AbortSignal): Promise<boolean> {
    const task = await this.refresh(signal);
    return !isTerminal(this.category, task.status);
  }

  /**
   * Queries the task once and returns its data payload
   */
  async data(signal?: AbortSignal): Promise<unknown> {
    return (await this.refresh(signal)).data;
  }

  /**
   * Object-storage information for the byte transfer, polling until the
   * task reaches the code that carries it.
   */
  async objectStorageData(options: TransferWaitOptions = {}): Promise<TStagingData> {
    const taskId = this.requireTaskId('objectStorageData');
    if (this.stagingData !== undefined) {
      return this.stagingData;
    }

    const readyCode = dataReadyCode(this.category);
    const predicate =
      readyCode === undefined ? terminalPredicate(this.category) : milestonePredicate(this.category, readyCode);
    const task = await this.poll(taskId, predicate, options);

    if (isFailure(this.category, task.status)) {
      this.state = 'failed';
      throw this.failure(task);
    }
    if (this.stagingData === undefined) {
      throw new InvalidStateError(
        `Task ${taskId} moved past status ${readyCode} before its staging data was observed`,
        this.state
      );
    }
    return this.stagingData;
  }

  /**
   * Asks the server to revoke the staging URL. A failure is thrown to the
   * caller and leaves the transfer state unchanged.
   */
  async invalidateObjectStorageLink(signal?: AbortSignal): Promise<void> {
    const taskId = this.requireTaskId('invalidateObjectStorageLink');
    try {
      await this.context.transport.request({
        method: 'POST',
        path: '/storage/xfer-external/invalidate',
        headers: { 'X-Task-Id': taskId },
        expectedStatus: 201,
        signal,
      });
    } catch (error) {
      this.context.logger.warn(`Could not invalidate the staging link of task ${taskId}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
    this.context.logger.info(`Invalidated the staging link of task ${taskId}`);
  }

  protected requireTaskId(operation: string): string {
    if (this.id === undefined) {
      throw new InvalidStateError(`Cannot call ${operation}() before the ${this.direction} is initiated`, this.state);
    }
    return this.id;
  }

  protected async poll(
    taskId: string,
    predicate: (task: TaskSnapshot) => boolean,
    options: TransferWaitOptions
  ): Promise<TaskSnapshot> {
    return this.context.poller.pollUntil(taskId, predicate, {
      category: this.category,
      previousStatus: this.lastTask?.status,
      timeoutMs: options.timeoutMs,
      signal: options.signal,
      onUpdate: task => this.observe(task),
    });
  }

  protected failure(task: TaskSnapshot): TransferFailureError {
    const error = new TransferFailureError(task);
    this.context.logger.error(error.message, { taskId: task.taskId, status: task.status });
    return error;
  }

  private async refresh(signal?: AbortSignal): Promise<TaskSnapshot> {
    const taskId = this.requireTaskId('status');
    const task = await this.context.tasks.getTask(taskId, signal);
    this.observe(task);
    return task;
  }

  private observe(task: TaskSnapshot): void {
    this.lastTask = task;
    if (this.stagingData === undefined && task.status === dataReadyCode(this.category)) {
      this.stagingData = this.parseStagingData(task);
    }
  }
}

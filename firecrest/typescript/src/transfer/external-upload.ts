import { InvalidStateError, RequestFailureError } from '../errors/categories.js';
import { isFailure, terminalPredicate } from '../tasks/state-machine.js';
import type { TaskCategory, TaskSnapshot } from '../tasks/types.js';
import type { StagingForm } from '../transport/object-storage.js';
import { ExternalTransfer } from './external-transfer.js';
import { uploadReadySchema, type TransferContext, type TransferWaitOptions } from './types.js';

/**
 * Upload of a local file through the object-storage staging area.
 *
 * 110 waiting for the form URL, 111 form URL ready, the client posts the
 * file, 112 object storage confirms, 113 the server pulls the file, 114 done.
 */
export class ExternalUpload extends ExternalTransfer<StagingForm> {
  readonly direction = 'upload';

  private uploaded = false;

  constructor(
    context: TransferContext,
    machine: string,
    readonly localPath: string,
    readonly targetPath: string,
    taskId?: string
  ) {
    super(context, machine, taskId);
  }

  protected get category(): TaskCategory {
    return 'upload';
  }

  protected initiationPath(): string {
    return '/storage/xfer-external/upload';
  }

  protected initiationFields(): Record<string, string> {
    return { sourcePath: this.localPath, targetPath: this.targetPath };
  }

  protected parseStagingData(task: TaskSnapshot): StagingForm {
    const parsed = uploadReadySchema.safeParse(task.data);
    if (!parsed.success) {
      throw new RequestFailureError(`Task ${task.taskId} reached status ${task.rawStatus} without an upload form`, {
        responseBody: task.data,
        isRetryable: false,
        details: { issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`) },
      });
    }
    const { method, url, data, headers, params } = parsed.data.msg.parameters;
    return { method, url, data, headers, params };
  }

  /**
   * Sends the local file to the staging area and waits until the server has
   * moved it to `targetPath`.
   *
   * The staging link accepts one upload only, so a second call after the
   * bytes were sent fails with InvalidStateError.
   */
  async finishUpload(options: TransferWaitOptions = {}): Promise<void> {
    const taskId = this.requireTaskId('finishUpload');
    if (this.uploaded) {
      throw new InvalidStateError(
        `The file of task ${taskId} was already sent to the staging area; the staging link is single use`,
        this.state
      );
    }

    await this.context.objectStorage.assertReadable(this.localPath);

    const previous = this.state;
    this.state = 'in_progress';

    let form = this.stagingData;
    if (form === undefined) {
      try {
        form = await this.objectStorageData(options);
      } catch (error) {
        if (this.lifecycle !== 'failed') {
          this.state = previous;
        }
        throw error;
      }
    }

    try {
      await this.context.objectStorage.uploadFile(this.localPath, form, options.signal);
    } catch (error) {
      this.state = previous;
      throw error;
    }
    this.uploaded = true;
    this.context.logger.info(`File ${this.localPath} sent to the staging area`, { taskId });

    await this.waitForCompletion(options);
  }

  /**
   * Polls until the server reports the end of the transfer to `targetPath`
   */
  async waitForCompletion(options: TransferWaitOptions = {}): Promise<void> {
    const taskId = this.requireTaskId('waitForCompletion');
    if (!this.uploaded) {
      throw new InvalidStateError(`The file of task ${taskId} has not been sent to the staging area yet`, this.state);
    }

    const task = await this.poll(taskId, terminalPredicate(this.category), options);
    if (isFailure(this.category, task.status)) {
      this.state = 'failed';
      throw this.failure(task);
    }
    this.state = 'finished';
    this.context.logger.info(`Upload of ${this.localPath} to ${this.targetPath} finished`, { taskId });
  }
}

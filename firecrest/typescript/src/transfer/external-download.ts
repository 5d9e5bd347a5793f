import { RequestFailureError } from '../errors/categories.js';
import { isFailure, terminalPredicate } from '../tasks/state-machine.js';
import type { TaskCategory, TaskSnapshot } from '../tasks/types.js';
import { ExternalTransfer } from './external-transfer.js';
import { downloadReadySchema, type TransferContext, type TransferWaitOptions } from './types.js';

/**
 * Download of a remote file through the object-storage staging area.
 *
 * The server copies the file to the staging area (116), then publishes a
 * temporary URL (117) from which the client fetches the bytes.
 */
export class ExternalDownload extends ExternalTransfer<string> {
  readonly direction = 'download';

  constructor(
    context: TransferContext,
    machine: string,
    readonly sourcePath: string,
    taskId?: string
  ) {
    super(context, machine, taskId);
  }

  protected get category(): TaskCategory {
    return 'download';
  }

  protected initiationPath(): string {
    return '/storage/xfer-external/download';
  }

  protected initiationFields(): Record<string, string> {
    return { sourcePath: this.sourcePath };
  }

  protected parseStagingData(task: TaskSnapshot): string {
    const parsed = downloadReadySchema.safeParse(task.data);
    if (!parsed.success) {
      throw new RequestFailureError(`Task ${task.taskId} reached status ${task.rawStatus} without a staging URL`, {
        responseBody: task.data,
        isRetryable: false,
      });
    }
    return typeof parsed.data === 'string' ? parsed.data : parsed.data.url;
  }

  /**
   * Waits until the file is in the staging area, then saves it to `localPath`.
   * Can be called again to fetch the file once more while the link is valid.
   *
   * @returns Number of bytes written
   */
  async finishDownload(localPath: string, options: TransferWaitOptions = {}): Promise<number> {
    const taskId = this.requireTaskId('finishDownload');
    const previous = this.state;

    this.state = 'in_progress';
    let url: string;
    try {
      if (this.stagingData === undefined) {
        const task = await this.poll(taskId, terminalPredicate(this.category), options);
        if (isFailure(this.category, task.status)) {
          this.state = 'failed';
          throw this.failure(task);
        }
      }
      url = await this.objectStorageData(options);
    } catch (error) {
      if (this.lifecycle !== 'failed') {
        this.state = previous;
      }
      throw error;
    }

    try {
      const bytes = await this.context.objectStorage.downloadToFile(url, localPath, options.signal);
      this.state = 'finished';
      this.context.logger.info(`Download of ${this.sourcePath} finished`, { taskId, localPath, bytes });
      return bytes;
    } catch (error) {
      this.state = previous;
      throw error;
    }
  }
}

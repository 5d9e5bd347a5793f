import { openAsBlob } from 'fs';
import { basename } from 'path';
import type { z } from 'zod';
import { LocalIoError, RequestFailureError, TimeoutError, TransferFailureError } from '../../errors/categories.js';
import type { Logger } from '../../observability/logging.js';
import { isFailure, terminalPredicate } from '../../tasks/state-machine.js';
import type { TaskPoller } from '../../tasks/task-poller.js';
import { taskCreatedSchema, type TaskSnapshot } from '../../tasks/types.js';
import type { HttpTransport, RequestBody } from '../../transport/http-transport.js';
import type { TransferWaitOptions } from '../../transfer/types.js';
import {
  jobAcctListSchema,
  jobQueueListSchema,
  jobSubmitSchema,
  type AccountingOptions,
  type JobAcctEntry,
  type JobQueueEntry,
  type JobScript,
  type JobSubmission,
  type SubmitAndWaitOptions,
  type SubmitOptions,
} from './types.js';

export interface ComputeService {
  /**
   * Submits a batch script and waits for the scheduler to accept it
   */
  submit(machine: string, script: JobScript, options?: SubmitOptions): Promise<JobSubmission>;

  /**
   * Jobs still known to the queue (`squeue`), optionally restricted to `jobs`
   */
  pollActive(machine: string, jobs?: readonly (string | number)[], options?: TransferWaitOptions): Promise<JobQueueEntry[]>;

  /**
   * Accounting records (`sacct`), optionally restricted to `jobs`
   */
  poll(machine: string, jobs?: readonly (string | number)[], options?: AccountingOptions): Promise<JobAcctEntry[]>;

  /**
   * Submits a script, waits until the job has left the queue and returns its accounting record
   */
  submitAndWait(machine: string, script: JobScript, options?: SubmitAndWaitOptions): Promise<JobAcctEntry>;
}

export class ComputeServiceImpl implements ComputeService {
  constructor(
    private readonly transport: HttpTransport,
    private readonly poller: TaskPoller,
    private readonly logger: Logger
  ) {}

  async submit(machine: string, script: JobScript, options: SubmitOptions = {}): Promise<JobSubmission> {
    const fields: Record<string, string> = {};
    if (options.account) {
      fields.account = options.account;
    }
    if (options.env && Object.keys(options.env).length > 0) {
      fields.env = JSON.stringify(options.env);
    }

    let path: string;
    let body: RequestBody;
    if (script.kind === 'remote') {
      path = '/compute/jobs/path';
      body = { type: 'form', fields: { ...fields, targetPath: script.path } };
    } else {
      path = '/compute/jobs/upload';
      const form = new FormData();
      for (const [key, value] of Object.entries(fields)) {
        form.append(key, value);
      }
      if (script.kind === 'inline') {
        form.append('file', new Blob([script.content], { type: 'text/plain' }), 'script.batch');
      } else {
        form.append('file', await readScript(script.path), basename(script.path));
      }
      body = { type: 'multipart', form };
    }

    const taskId = await this.createTask(machine, path, 201, body, undefined, options.signal);
    this.logger.info(`Job submission task: ${taskId}`, { machine });

    const task = await this.waitForTask(taskId, options);
    const parsed = jobSubmitSchema.safeParse(task.data);
    if (!parsed.success) {
      throw unexpectedData(task, parsed.error);
    }
    return { ...parsed.data, firecrestTaskId: taskId };
  }

  async pollActive(
    machine: string,
    jobs: readonly (string | number)[] = [],
    options: TransferWaitOptions = {}
  ): Promise<JobQueueEntry[]> {
    return (await this.queue(machine, jobs, options)).entries;
  }

  async poll(
    machine: string,
    jobs: readonly (string | number)[] = [],
    options: AccountingOptions = {}
  ): Promise<JobAcctEntry[]> {
    const query = {
      ...jobQuery(jobs),
      starttime: options.startTime,
      endtime: options.endTime,
    };
    const taskId = await this.createTask(machine, '/compute/acct', 200, undefined, query, options.signal);
    this.logger.info(`Job polling task: ${taskId}`, { machine });

    const task = await this.waitForTask(taskId, options);
    const parsed = jobAcctListSchema.safeParse(task.data ?? []);
    if (!parsed.success) {
      throw unexpectedData(task, parsed.error);
    }
    return Array.isArray(parsed.data) ? parsed.data : Object.values(parsed.data);
  }

  async submitAndWait(machine: string, script: JobScript, options: SubmitAndWaitOptions = {}): Promise<JobAcctEntry> {
    const startedAt = Date.now();
    const remaining = (): TransferWaitOptions => ({
      signal: options.signal,
      timeoutMs: options.timeoutMs === undefined ? undefined : Math.max(options.timeoutMs - (Date.now() - startedAt), 0),
    });

    const submission = await this.submit(machine, script, { ...options, ...remaining() });
    const jobId = String(submission.jobid);

    for (;;) {
      const { task, entries } = await this.queue(machine, [jobId], remaining());
      const queued = entries.find(entry => entry.jobid === jobId);
      if (!queued) {
        break;
      }
      const elapsedMs = Date.now() - startedAt;
      if (options.timeoutMs !== undefined && elapsedMs >= options.timeoutMs) {
        throw new TimeoutError(task, options.timeoutMs, elapsedMs);
      }
      this.logger.debug(`Job ${jobId} is still in the queue`, { state: queued.state });
    }

    const records = await this.poll(machine, [jobId], remaining());
    const record = records.find(entry => entry.jobid === jobId);
    if (!record) {
      throw new RequestFailureError(`No accounting record for job ${jobId}`, {
        responseBody: records,
        isRetryable: true,
        details: { jobId, firecrestTaskId: submission.firecrestTaskId },
      });
    }
    this.logger.info(`Job ${jobId} finished with state ${record.state ?? 'unknown'}`, { machine });
    return record;
  }

  /**
   * One `squeue` round trip; keeps the compute task for timeout reporting
   */
  private async queue(
    machine: string,
    jobs: readonly (string | number)[],
    options: TransferWaitOptions
  ): Promise<{ task: TaskSnapshot; entries: JobQueueEntry[] }> {
    const taskId = await this.createTask(machine, '/compute/jobs', 200, undefined, jobQuery(jobs), options.signal);
    this.logger.info(`Job active polling task: ${taskId}`, { machine });

    const task = await this.waitForTask(taskId, options);
    const parsed = jobQueueListSchema.safeParse(task.data ?? []);
    if (!parsed.success) {
      throw unexpectedData(task, parsed.error);
    }
    return { task, entries: Array.isArray(parsed.data) ? parsed.data : Object.values(parsed.data) };
  }

  private async createTask(
    machine: string,
    path: string,
    expectedStatus: number,
    body: RequestBody | undefined,
    query: Record<string, string | undefined> | undefined,
    signal: AbortSignal | undefined
  ): Promise<string> {
    const response = await this.transport.request({
      method: body ? 'POST' : 'GET',
      path,
      headers: { 'X-Machine-Name': machine },
      query,
      body,
      expectedStatus,
      signal,
    });
    const created = taskCreatedSchema.safeParse(response.body);
    if (!created.success) {
      throw new RequestFailureError(`${path} did not return a task id`, {
        status: response.status,
        responseBody: response.body,
        isRetryable: false,
      });
    }
    return created.data.task_id;
  }

  private async waitForTask(taskId: string, options: TransferWaitOptions): Promise<TaskSnapshot> {
    const task = await this.poller.pollUntil(taskId, terminalPredicate('compute'), {
      category: 'compute',
      timeoutMs: options.timeoutMs,
      signal: options.signal,
    });
    if (isFailure('compute', task.status)) {
      const error = new TransferFailureError(
        task,
        `Compute task ${taskId} failed: ${typeof task.data === 'string' ? task.data : task.description}`
      );
      this.logger.error(error.message, { taskId, status: task.status });
      throw error;
    }
    return task;
  }
}

async function readScript(path: string): Promise<Blob> {
  try {
    return await openAsBlob(path);
  } catch (error) {
    throw new LocalIoError(`Cannot read batch script ${path}`, path, error);
  }
}

function jobQuery(jobs: readonly (string | number)[]): Record<string, string | undefined> {
  return { jobs: jobs.length > 0 ? jobs.map(String).join(',') : undefined };
}

function unexpectedData(task: TaskSnapshot, error: z.ZodError): RequestFailureError {
  return new RequestFailureError(`Unexpected data in compute task ${task.taskId}`, {
    responseBody: task.data,
    isRetryable: false,
    details: { issues: error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`) },
  });
}

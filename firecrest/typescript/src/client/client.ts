import { configFromEnv, resolveConfig, type FirecrestConfig, type PartialFirecrestConfig } from '../config/config.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import { RateLimiter } from '../resilience/rate-limiter.js';
import type { ServiceCategory, TimeBetweenCalls } from '../resilience/types.js';
import {
  ComputeServiceImpl,
  type AccountingOptions,
  type ComputeService,
  type JobAcctEntry,
  type JobQueueEntry,
  type JobScript,
  type JobSubmission,
  type SubmitAndWaitOptions,
  type SubmitOptions,
} from '../services/compute/index.js';
import {
  StatusServiceImpl,
  type DeploymentParameters,
  type StatusService,
  type SystemStatus,
} from '../services/status/service.js';
import {
  UtilitiesServiceImpl,
  type FileEntry,
  type ListFilesOptions,
  type UtilitiesService,
} from '../services/utilities/service.js';
import { TaskPoller, type PollOptions } from '../tasks/task-poller.js';
import { TasksService } from '../tasks/tasks-service.js';
import type { TaskPredicate, TaskSnapshot } from '../tasks/types.js';
import { ExternalDownload } from '../transfer/external-download.js';
import { ExternalUpload } from '../transfer/external-upload.js';
import type { TransferContext, TransferWaitOptions } from '../transfer/types.js';
import { FetchHttpTransport, type HttpTransport } from '../transport/http-transport.js';
import { FetchObjectStorageTransfer, type ObjectStorageTransfer } from '../transport/object-storage.js';

/**
 * Main FirecREST client interface
 */
export interface FirecrestClient {
  /**
   * Starts an upload through the staging area and returns it for manual stepping
   */
  externalUpload(machine: string, localPath: string, remotePath: string, signal?: AbortSignal): Promise<ExternalUpload>;

  /**
   * Starts a download through the staging area and returns it for manual stepping
   */
  externalDownload(machine: string, remotePath: string, signal?: AbortSignal): Promise<ExternalDownload>;

  /**
   * Uploads `localPath` to `remotePath` and waits until the file is in place
   */
  upload(machine: string, localPath: string, remotePath: string, options?: TransferWaitOptions): Promise<ExternalUpload>;

  /**
   * Downloads `remotePath` into `localPath`; resolves with the number of bytes written
   */
  download(machine: string, remotePath: string, localPath: string, options?: TransferWaitOptions): Promise<number>;

  submit(machine: string, script: JobScript, options?: SubmitOptions): Promise<JobSubmission>;
  pollActive(machine: string, jobs?: readonly (string | number)[], options?: TransferWaitOptions): Promise<JobQueueEntry[]>;
  poll(machine: string, jobs?: readonly (string | number)[], options?: AccountingOptions): Promise<JobAcctEntry[]>;
  submitAndWait(machine: string, script: JobScript, options?: SubmitAndWaitOptions): Promise<JobAcctEntry>;

  /**
   * Re-queries any task until `predicate` holds
   */
  pollTask(taskId: string, predicate: TaskPredicate, options?: PollOptions): Promise<TaskSnapshot>;

  /**
   * One status request for a task
   */
  task(taskId: string, signal?: AbortSignal): Promise<TaskSnapshot>;

  /**
   * The given tasks, or every task of the user when `taskIds` is empty
   */
  listTasks(taskIds?: readonly string[], signal?: AbortSignal): Promise<Map<string, TaskSnapshot>>;

  allSystems(signal?: AbortSignal): Promise<SystemStatus[]>;
  system(name: string, signal?: AbortSignal): Promise<SystemStatus>;
  parameters(signal?: AbortSignal): Promise<DeploymentParameters>;
  listFiles(machine: string, targetPath: string, options?: ListFilesOptions): Promise<FileEntry[]>;

  /**
   * Minimum milliseconds between two calls of the same category, for this client only
   */
  readonly timeBetweenCalls: Readonly<TimeBetweenCalls>;
  setTimeBetweenCalls(category: ServiceCategory, intervalMs: number): void;

  getConfig(): Readonly<FirecrestConfig>;
}

export interface ClientDependencies {
  /** Replaces the fetch-based byte transfer to and from the staging area */
  objectStorage?: ObjectStorageTransfer;
}

/**
 * Implementation of the FirecREST client.
 *
 * Every client owns one rate limiter, shared by all its services, transfers
 * and polls. Two clients never throttle each other.
 */
export class FirecrestClientImpl implements FirecrestClient {
  private readonly config: FirecrestConfig;
  private readonly logger: Logger;
  private readonly rateLimiter: RateLimiter;
  private readonly transport: HttpTransport;
  private readonly tasks: TasksService;
  private readonly poller: TaskPoller;
  private readonly transferContext: TransferContext;
  private readonly compute: ComputeService;
  private readonly status: StatusService;
  private readonly utilities: UtilitiesService;

  constructor(config: PartialFirecrestConfig, dependencies: ClientDependencies = {}) {
    this.config = resolveConfig(config);
    this.logger = this.config.logger ?? new NoopLogger();

    this.rateLimiter = new RateLimiter({
      defaultIntervalMs: this.config.defaultTimeBetweenCalls,
      intervals: this.config.timeBetweenCalls,
    });
    this.rateLimiter.addHook({
      onThrottled: (category, waitMs) => this.logger.debug(`Waiting ${waitMs}ms before the next ${category} call`),
    });

    this.transport = new FetchHttpTransport({
      baseUrl: this.config.baseUrl,
      authorization: this.config.authorization,
      rateLimiter: this.rateLimiter,
      timeout: this.config.timeout,
      headers: { 'User-Agent': this.config.userAgent, ...this.config.headers },
      fetch: this.config.fetch,
      logger: this.logger,
    });

    this.tasks = new TasksService(this.transport);
    this.poller = new TaskPoller(this.tasks, this.logger);
    this.transferContext = {
      transport: this.transport,
      tasks: this.tasks,
      poller: this.poller,
      objectStorage: dependencies.objectStorage ?? new FetchObjectStorageTransfer(this.logger, this.config.fetch),
      logger: this.logger,
    };
    this.compute = new ComputeServiceImpl(this.transport, this.poller, this.logger);
    this.status = new StatusServiceImpl(this.transport);
    this.utilities = new UtilitiesServiceImpl(this.transport);
  }

  async externalUpload(
    machine: string,
    localPath: string,
    remotePath: string,
    signal?: AbortSignal
  ): Promise<ExternalUpload> {
    const upload = new ExternalUpload(this.transferContext, machine, localPath, remotePath);
    await upload.initiate(signal);
    return upload;
  }

  async externalDownload(machine: string, remotePath: string, signal?: AbortSignal): Promise<ExternalDownload> {
    const download = new ExternalDownload(this.transferContext, machine, remotePath);
    await download.initiate(signal);
    return download;
  }

  async upload(
    machine: string,
    localPath: string,
    remotePath: string,
    options: TransferWaitOptions = {}
  ): Promise<ExternalUpload> {
    // no staging task for a file that cannot be sent
    await this.transferContext.objectStorage.assertReadable(localPath);
    const upload = await this.externalUpload(machine, localPath, remotePath, options.signal);
    await upload.finishUpload(options);
    return upload;
  }

  async download(
    machine: string,
    remotePath: string,
    localPath: string,
    options: TransferWaitOptions = {}
  ): Promise<number> {
    const download = await this.externalDownload(machine, remotePath, options.signal);
    return download.finishDownload(localPath, options);
  }

  submit(machine: string, script: JobScript, options?: SubmitOptions): Promise<JobSubmission> {
    return this.compute.submit(machine, script, options);
  }

  pollActive(
    machine: string,
    jobs?: readonly (string | number)[],
    options?: TransferWaitOptions
  ): Promise<JobQueueEntry[]> {
    return this.compute.pollActive(machine, jobs, options);
  }

  poll(machine: string, jobs?: readonly (string | number)[], options?: AccountingOptions): Promise<JobAcctEntry[]> {
    return this.compute.poll(machine, jobs, options);
  }

  submitAndWait(machine: string, script: JobScript, options?: SubmitAndWaitOptions): Promise<JobAcctEntry> {
    return this.compute.submitAndWait(machine, script, options);
  }

  pollTask(taskId: string, predicate: TaskPredicate, options?: PollOptions): Promise<TaskSnapshot> {
    return this.poller.pollUntil(taskId, predicate, options);
  }

  task(taskId: string, signal?: AbortSignal): Promise<TaskSnapshot> {
    return this.tasks.getTask(taskId, signal);
  }

  listTasks(taskIds?: readonly string[], signal?: AbortSignal): Promise<Map<string, TaskSnapshot>> {
    return this.tasks.listTasks(taskIds, signal);
  }

  allSystems(signal?: AbortSignal): Promise<SystemStatus[]> {
    return this.status.allSystems(signal);
  }

  system(name: string, signal?: AbortSignal): Promise<SystemStatus> {
    return this.status.system(name, signal);
  }

  parameters(signal?: AbortSignal): Promise<DeploymentParameters> {
    return this.status.parameters(signal);
  }

  listFiles(machine: string, targetPath: string, options?: ListFilesOptions): Promise<FileEntry[]> {
    return this.utilities.listFiles(machine, targetPath, options);
  }

  get timeBetweenCalls(): Readonly<TimeBetweenCalls> {
    return this.rateLimiter.getTimeBetweenCalls();
  }

  setTimeBetweenCalls(category: ServiceCategory, intervalMs: number): void {
    this.rateLimiter.setTimeBetweenCalls(category, intervalMs);
  }

  getConfig(): Readonly<FirecrestConfig> {
    return Object.freeze({ ...this.config });
  }
}

/**
 * Creates a new FirecREST client with the provided configuration
 */
export function createClient(config: PartialFirecrestConfig, dependencies?: ClientDependencies): FirecrestClient {
  return new FirecrestClientImpl(config, dependencies);
}

/**
 * Creates a new FirecREST client using environment variables
 *
 * Expected environment variables:
 * - FIRECREST_URL
 * - FIRECREST_CLIENT_ID
 * - FIRECREST_CLIENT_SECRET
 * - AUTH_TOKEN_URL
 */
export function createClientFromEnv(overrides?: PartialFirecrestConfig): FirecrestClient {
  const config = configFromEnv(process.env, overrides?.fetch).build();
  return createClient({ ...config, ...overrides });
}

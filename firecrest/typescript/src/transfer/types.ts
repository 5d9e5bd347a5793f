import { z } from 'zod';
import type { Logger } from '../observability/logging.js';
import type { TaskPoller } from '../tasks/task-poller.js';
import type { TaskSource } from '../tasks/tasks-service.js';
import type { HttpTransport } from '../transport/http-transport.js';
import type { ObjectStorageTransfer } from '../transport/object-storage.js';

/**
 * created → staged → in_progress → finished | failed
 */
export type TransferState = 'created' | 'staged' | 'in_progress' | 'finished' | 'failed';

export type TransferDirection = 'upload' | 'download';

/**
 * Collaborators shared by every transfer of one client
 */
export interface TransferContext {
  transport: HttpTransport;
  tasks: TaskSource;
  poller: TaskPoller;
  objectStorage: ObjectStorageTransfer;
  logger: Logger;
}

export interface TransferWaitOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

const scalar = z.union([z.string(), z.number()]);

export const stagingFormSchema = z
  .object({
    method: z.string().default('POST'),
    url: z.string().url(),
    data: z.record(scalar).default({}),
    headers: z.record(z.string()).default({}),
    params: z.record(scalar).default({}),
  })
  .passthrough();

/**
 * Task data of an upload at status 111
 */
export const uploadReadySchema = z.object({
  msg: z
    .object({
      command: z.string().optional(),
      parameters: stagingFormSchema,
    })
    .passthrough(),
});

/**
 * Task data of a download at status 117: a bare URL on older deployments, `{ url }` on newer ones
 */
export const downloadReadySchema = z.union([
  z.string().url(),
  z.object({ url: z.string().url() }).passthrough(),
]);

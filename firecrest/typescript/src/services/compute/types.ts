import { z } from 'zod';
import type { TransferWaitOptions } from '../../transfer/types.js';

/**
 * Batch script to submit: exactly one of the three sources
 */
export type JobScript =
  | { kind: 'inline'; content: string }
  | { kind: 'local'; path: string }
  | { kind: 'remote'; path: string };

export interface SubmitOptions extends TransferWaitOptions {
  /** Project account the job is charged to */
  account?: string;
  /** Environment variables exported for the job */
  env?: Record<string, string>;
}

export interface AccountingOptions extends TransferWaitOptions {
  startTime?: string;
  endTime?: string;
}

export interface SubmitAndWaitOptions extends SubmitOptions {
  /** Upper bound on the whole submit, queue and accounting sequence */
  timeoutMs?: number;
}

const looseString = z.union([z.string(), z.number()]).transform(String);

export const jobSubmitSchema = z
  .object({
    jobid: z.union([z.number(), z.string()]).transform(Number),
    result: z.string().optional(),
    job_file: z.string().optional(),
    job_file_out: z.string().optional(),
    job_file_err: z.string().optional(),
    job_data_out: z.string().optional(),
    job_data_err: z.string().optional(),
  })
  .passthrough();

export const jobQueueSchema = z
  .object({
    jobid: looseString,
    name: z.string().optional(),
    state: z.string().optional(),
    partition: z.string().optional(),
    nodes: looseString.optional(),
    nodelist: z.string().optional(),
    start_time: z.string().optional(),
    time: z.string().optional(),
    time_left: z.string().optional(),
    user: z.string().optional(),
    job_file: z.string().optional(),
    job_file_out: z.string().optional(),
    job_file_err: z.string().optional(),
  })
  .passthrough();

export const jobAcctSchema = z
  .object({
    jobid: looseString,
    name: z.string().optional(),
    state: z.string().optional(),
    partition: z.string().optional(),
    nodes: looseString.optional(),
    nodelist: z.string().optional(),
    start_time: z.string().optional(),
    time: z.string().optional(),
    time_left: z.string().optional(),
    user: z.string().optional(),
  })
  .passthrough();

export type JobQueueEntry = z.infer<typeof jobQueueSchema>;
export type JobAcctEntry = z.infer<typeof jobAcctSchema>;

/**
 * Result of a submission, with the id of the compute task that ran `sbatch`
 */
export type JobSubmission = z.infer<typeof jobSubmitSchema> & { firecrestTaskId: string };

/**
 * `squeue` returns an object keyed by position, `sacct` an array, or `{}` when empty
 */
export const jobQueueListSchema = z.union([z.array(jobQueueSchema), z.record(jobQueueSchema)]);
export const jobAcctListSchema = z.union([z.array(jobAcctSchema), z.record(jobAcctSchema)]);

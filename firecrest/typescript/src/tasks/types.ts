/**
 * Task types and the wire schema of the `/tasks` endpoint.
 */

import { z } from 'zod';

/**
 * Kinds of server-side task, each with its own status-code table
 */
export type TaskCategory = 'upload' | 'download' | 'compute';

export type StatusClass = 'pending' | 'success' | 'failure' | 'unknown';

/**
 * Immutable view of a task as returned by one status request
 */
export interface TaskSnapshot {
  readonly taskId: string;
  /** Numeric status code; NaN when the server sent something non-numeric */
  readonly status: number;
  /** Status exactly as sent by the server */
  readonly rawStatus: string;
  readonly description: string;
  readonly data: unknown;
  readonly service?: string;
  readonly updatedAt?: string;
}

export type TaskPredicate = (task: TaskSnapshot) => boolean;

export const taskRecordSchema = z
  .object({
    task_id: z.string().optional(),
    hash_id: z.string().optional(),
    status: z.union([z.string(), z.number()]),
    description: z.string().optional(),
    data: z.unknown().optional(),
    service: z.string().optional(),
    updated_at: z.string().optional(),
    last_modify: z.string().optional(),
  })
  .passthrough();

export type TaskRecord = z.infer<typeof taskRecordSchema>;

export const tasksResponseSchema = z.object({
  tasks: z.record(taskRecordSchema),
});

/**
 * Response of every request that creates a task
 */
export const taskCreatedSchema = z
  .object({
    task_id: z.union([z.string(), z.number()]).transform(String),
    task_url: z.string().optional(),
  })
  .passthrough();

export function toTaskSnapshot(taskId: string, record: TaskRecord): TaskSnapshot {
  const rawStatus = String(record.status);
  return {
    taskId,
    status: /^\d+$/.test(rawStatus.trim()) ? Number(rawStatus) : Number.NaN,
    rawStatus,
    description: record.description ?? '',
    data: record.data,
    service: record.service,
    updatedAt: record.updated_at ?? record.last_modify,
  };
}

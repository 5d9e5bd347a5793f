/**
 * Status codes of FirecREST tasks and their transition rules.
 *
 * Pure functions only: the poller and the transfer objects call into this
 * module for every decision about a status code.
 */

import type { StatusClass, TaskCategory, TaskPredicate } from './types.js';

export const TaskStatus = {
  Queued: 100,
  ComputeInProgress: 101,
  ComputeSuccess: 200,
  ComputeFailure: 400,

  UploadWaitingForFormUrl: 110,
  UploadFormUrlReady: 111,
  UploadToStorageConfirmed: 112,
  UploadDownloadToServerStarted: 113,
  UploadSuccess: 114,
  UploadFailure: 115,

  DownloadInProgress: 116,
  DownloadSuccess: 117,
  DownloadFailure: 118,
} as const;

interface StatusTable {
  /** Queued codes besides `queuedBelow` */
  queued: readonly number[];
  /** Integer codes below this are also "queued" */
  queuedBelow?: number;
  inProgress: readonly number[];
  success: number;
  failure: number;
  /** Highest code of the table; codes from `success` up to here, other than `failure`, are success */
  upperBound: number;
  /** Code at which the transfer data (form URL, download URL) becomes available */
  dataReady?: number;
}

const STATUS_TABLES: Record<TaskCategory, StatusTable> = {
  download: {
    queued: [TaskStatus.Queued],
    queuedBelow: TaskStatus.DownloadInProgress,
    inProgress: [TaskStatus.DownloadInProgress],
    success: TaskStatus.DownloadSuccess,
    failure: TaskStatus.DownloadFailure,
    upperBound: TaskStatus.DownloadFailure,
    dataReady: TaskStatus.DownloadSuccess,
  },
  upload: {
    queued: [TaskStatus.Queued],
    inProgress: [
      TaskStatus.UploadWaitingForFormUrl,
      TaskStatus.UploadFormUrlReady,
      TaskStatus.UploadToStorageConfirmed,
      TaskStatus.UploadDownloadToServerStarted,
    ],
    success: TaskStatus.UploadSuccess,
    failure: TaskStatus.UploadFailure,
    upperBound: TaskStatus.DownloadFailure,
    dataReady: TaskStatus.UploadFormUrlReady,
  },
  compute: {
    queued: [TaskStatus.Queued],
    inProgress: [TaskStatus.ComputeInProgress],
    success: TaskStatus.ComputeSuccess,
    failure: TaskStatus.ComputeFailure,
    upperBound: TaskStatus.ComputeSuccess,
  },
};

const STATUS_DESCRIPTIONS: Record<number, string> = {
  [TaskStatus.Queued]: 'Queued',
  [TaskStatus.ComputeInProgress]: 'In progress',
  [TaskStatus.ComputeSuccess]: 'Finished successfully',
  [TaskStatus.ComputeFailure]: 'Finished with errors',
  [TaskStatus.UploadWaitingForFormUrl]: 'Waiting for Form URL from Object Storage to be retrieved',
  [TaskStatus.UploadFormUrlReady]: 'Form URL from Object Storage received',
  [TaskStatus.UploadToStorageConfirmed]: 'Object Storage confirms that upload to Object Storage has finished',
  [TaskStatus.UploadDownloadToServerStarted]: 'Download from Object Storage to server has started',
  [TaskStatus.UploadSuccess]: 'Download from Object Storage to server has finished',
  [TaskStatus.UploadFailure]: 'Download from Object Storage error',
  [TaskStatus.DownloadInProgress]: 'Started upload from filesystem to Object Storage',
  [TaskStatus.DownloadSuccess]: 'Upload from filesystem to Object Storage has finished successfully',
  [TaskStatus.DownloadFailure]: 'Upload from filesystem to Object Storage has finished with errors',
};

export function classifyStatus(category: TaskCategory, code: number): StatusClass {
  if (!Number.isInteger(code) || code < 0) {
    return 'unknown';
  }

  const table = STATUS_TABLES[category];
  const queued = table.queued.includes(code) || (table.queuedBelow !== undefined && code < table.queuedBelow);
  if (queued || table.inProgress.includes(code)) {
    return 'pending';
  }
  if (code === table.failure) {
    return 'failure';
  }
  if (code >= table.success && code <= table.upperBound) {
    return 'success';
  }
  return 'unknown';
}

export function isTerminal(category: TaskCategory, code: number): boolean {
  const statusClass = classifyStatus(category, code);
  return statusClass === 'success' || statusClass === 'failure';
}

export function isSuccess(category: TaskCategory, code: number): boolean {
  return classifyStatus(category, code) === 'success';
}

export function isFailure(category: TaskCategory, code: number): boolean {
  return classifyStatus(category, code) === 'failure';
}

export function successCode(category: TaskCategory): number {
  return STATUS_TABLES[category].success;
}

export function failureCode(category: TaskCategory): number {
  return STATUS_TABLES[category].failure;
}

/**
 * Code at which a transfer's object-storage data can be read, if the category has one
 */
export function dataReadyCode(category: TaskCategory): number | undefined {
  return STATUS_TABLES[category].dataReady;
}

export function terminalPredicate(category: TaskCategory): TaskPredicate {
  return task => isTerminal(category, task.status);
}

/**
 * Holds once the task has reached `milestone` or any terminal code
 */
export function milestonePredicate(category: TaskCategory, milestone: number): TaskPredicate {
  return task =>
    isTerminal(category, task.status) ||
    (classifyStatus(category, task.status) === 'pending' && task.status >= milestone);
}

/**
 * Checks a newly observed code against the previous one for the same task.
 * Codes only move forward, and a terminal code never changes.
 */
export function checkTransition(
  category: TaskCategory,
  previous: number | undefined,
  next: number
): 'ok' | 'regression' {
  if (previous === undefined || classifyStatus(category, previous) === 'unknown') {
    return 'ok';
  }
  if (isTerminal(category, previous)) {
    return next === previous ? 'ok' : 'regression';
  }
  return next >= previous ? 'ok' : 'regression';
}

export function describeStatus(code: number): string {
  return STATUS_DESCRIPTIONS[code] ?? `Unknown status ${code}`;
}

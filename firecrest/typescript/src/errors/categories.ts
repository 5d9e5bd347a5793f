import { FirecrestError } from './error.js';
import type { TaskSnapshot } from '../tasks/types.js';

/**
 * Error thrown when the client is misconfigured (e.g., missing base URL, negative interval)
 */
export class ConfigurationError extends FirecrestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      type: 'configuration_error',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when a request fails at the HTTP or transport level
 */
export class RequestFailureError extends FirecrestError {
  /** Parsed (or raw text) body of the failed response, when there was one */
  public readonly responseBody?: unknown;

  constructor(
    message: string,
    options: {
      status?: number;
      responseBody?: unknown;
      cause?: unknown;
      isRetryable?: boolean;
      details?: Record<string, unknown>;
    } = {}
  ) {
    super({
      type: 'request_failure',
      message,
      status: options.status,
      isRetryable: options.isRetryable ?? true,
      details: options.details,
      cause: options.cause,
    });
    this.name = 'RequestFailureError';
    this.responseBody = options.responseBody;
  }
}

/**
 * Error thrown when the request never produced a response (DNS, connection reset, abort on timeout)
 */
export class NetworkError extends RequestFailureError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause, isRetryable: true });
    this.name = 'NetworkError';
  }
}

/**
 * Error thrown when the server rejects the bearer token
 */
export class UnauthorizedError extends RequestFailureError {
  constructor(message: string, responseBody?: unknown) {
    super(message, { status: 401, responseBody, isRetryable: false });
    this.name = 'UnauthorizedError';
  }
}

/**
 * Error thrown when the requested endpoint or resource does not exist
 */
export class NotFoundError extends RequestFailureError {
  constructor(message: string, responseBody?: unknown) {
    super(message, { status: 404, responseBody, isRetryable: false });
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when a service category answers 429.
 * The next request in that category is already deferred by `retryAfter` seconds.
 */
export class RateLimitError extends RequestFailureError {
  public readonly retryAfter: number;

  constructor(message: string, retryAfter: number, responseBody?: unknown) {
    super(message, { status: 429, responseBody, isRetryable: true, details: { retryAfter } });
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
  }
}

/**
 * Error thrown when a poll deadline elapses before the task reached the expected state
 */
export class TimeoutError extends FirecrestError {
  public readonly task: TaskSnapshot;
  public readonly elapsedMs: number;

  constructor(task: TaskSnapshot, timeoutMs: number, elapsedMs: number) {
    super({
      type: 'timeout_error',
      message: `Task ${task.taskId} is still at status ${task.rawStatus} after ${elapsedMs}ms (timeout ${timeoutMs}ms)`,
      isRetryable: true,
      details: { taskId: task.taskId, status: task.status, timeoutMs, elapsedMs },
    });
    this.name = 'TimeoutError';
    this.task = task;
    this.elapsedMs = elapsedMs;
  }
}

/**
 * Error thrown when the server reports the terminal failure code of a transfer or compute task
 */
export class TransferFailureError extends FirecrestError {
  public readonly task: TaskSnapshot;

  constructor(task: TaskSnapshot, message?: string) {
    super({
      type: 'transfer_failure',
      message: message ?? `Task ${task.taskId} failed with status ${task.rawStatus}: ${task.description}`,
      isRetryable: false,
      details: { taskId: task.taskId, status: task.status, data: task.data },
    });
    this.name = 'TransferFailureError';
    this.task = task;
  }
}

/**
 * Error thrown when a local file cannot be read or written
 */
export class LocalIoError extends FirecrestError {
  public readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super({
      type: 'local_io_error',
      message,
      isRetryable: false,
      details: { path, code: systemErrorCode(cause) },
      cause,
    });
    this.name = 'LocalIoError';
    this.path = path;
  }
}

/**
 * Error thrown on API misuse, e.g. finalizing a transfer that was never initiated
 */
export class InvalidStateError extends FirecrestError {
  public readonly state: string;

  constructor(message: string, state: string) {
    super({
      type: 'invalid_state',
      message,
      isRetryable: false,
      details: { state },
    });
    this.name = 'InvalidStateError';
    this.state = state;
  }
}

export type UnknownStatusReason = 'unrecognized' | 'regression';

/**
 * Error thrown when a task reports a code outside its category's table,
 * or a code lower than one already observed. The task itself is not terminal.
 */
export class UnknownStatusError extends FirecrestError {
  public readonly task: TaskSnapshot;
  public readonly reason: UnknownStatusReason;

  constructor(task: TaskSnapshot, reason: UnknownStatusReason, previousStatus?: number) {
    super({
      type: 'unknown_status',
      message:
        reason === 'regression'
          ? `Task ${task.taskId} went back from status ${previousStatus} to ${task.rawStatus}`
          : `Task ${task.taskId} reported unrecognized status ${task.rawStatus}`,
      isRetryable: true,
      details: { taskId: task.taskId, status: task.status, previousStatus, reason },
    });
    this.name = 'UnknownStatusError';
    this.task = task;
    this.reason = reason;
  }
}

function systemErrorCode(cause: unknown): string | undefined {
  if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}

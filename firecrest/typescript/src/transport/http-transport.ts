import type { Authorization } from '../auth/authorization.js';
import {
  NetworkError,
  NotFoundError,
  RateLimitError,
  RequestFailureError,
  UnauthorizedError,
} from '../errors/categories.js';
import { logError, logRequest, logResponse, type Logger } from '../observability/logging.js';
import type { RateLimiter } from '../resilience/rate-limiter.js';
import { isServiceCategory, type ServiceCategory } from '../resilience/types.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type RequestBody =
  | { type: 'json'; value: unknown }
  | { type: 'form'; fields: Record<string, string> }
  | { type: 'multipart'; form: FormData };

export interface TransportRequest {
  method: HttpMethod;
  /** API path, e.g. `/tasks`; its first segment selects the rate-limit category */
  path: string;
  query?: Record<string, string | undefined>;
  headers?: Record<string, string>;
  body?: RequestBody;
  /** Status codes that count as success. Defaults to any 2xx. */
  expectedStatus?: number | readonly number[];
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Signal for request cancellation */
  signal?: AbortSignal;
}

export interface TransportResponse {
  status: number;
  headers: Headers;
  /** Parsed JSON, the raw text when it is not JSON, or undefined for an empty body */
  body: unknown;
}

/**
 * Interface for HTTP transport layer
 */
export interface HttpTransport {
  request(request: TransportRequest): Promise<TransportResponse>;
}

/**
 * Headers FirecREST sets on a response to describe a failed command
 */
export const ERROR_HEADERS = [
  'X-A-Directory',
  'X-Error',
  'X-Exists',
  'X-Invalid-Path',
  'X-Machine-Does-Not-Exist',
  'X-Machine-Not-Available',
  'X-Not-A-Directory',
  'X-Not-Found',
  'X-Permission-Denied',
  'X-Size-Limit',
  'X-Timeout',
] as const;

/** Seconds to defer a category when a 429 carries no usable reset header */
export const DEFAULT_RATE_LIMIT_RESET_SECONDS = 10;

export interface FetchHttpTransportOptions {
  baseUrl: string;
  authorization: Authorization;
  rateLimiter: RateLimiter;
  /** Default request timeout in milliseconds */
  timeout: number;
  headers?: Record<string, string>;
  fetch?: typeof fetch;
  logger: Logger;
}

/**
 * Implementation of HttpTransport using the Fetch API.
 *
 * Every request first waits on the rate limiter for its category, then asks
 * the authorization for a token. Failures are never retried here.
 */
export class FetchHttpTransport implements HttpTransport {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: FetchHttpTransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  async request(request: TransportRequest): Promise<TransportResponse> {
    const category = categoryForPath(request.path);
    if (category) {
      await this.options.rateLimiter.wait(category, request.signal);
    }

    const token = await this.options.authorization.getAccessToken();
    const url = this.buildUrl(request.path, request.query);
    const timeout = request.timeout ?? this.options.timeout;

    const headers: Record<string, string> = {
      ...this.options.headers,
      ...request.headers,
      Authorization: `Bearer ${token}`,
    };
    const body = encodeBody(request.body, headers);

    const controller = new AbortController();
    const onAbort = (): void => controller.abort(request.signal?.reason);
    request.signal?.addEventListener('abort', onAbort, { once: true });
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    logRequest(this.options.logger, request.method, url);
    const startedAt = Date.now();

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: request.method,
        headers,
        body,
        signal: controller.signal,
      });
    } catch (error) {
      if (request.signal?.aborted) {
        throw request.signal.reason;
      }
      const failure = controller.signal.aborted
        ? new NetworkError(`Request timeout after ${timeout}ms`, error)
        : new NetworkError(`${request.method} ${url} failed`, error);
      logError(this.options.logger, failure, request.path);
      throw failure;
    } finally {
      clearTimeout(timeoutId);
      request.signal?.removeEventListener('abort', onAbort);
    }

    const parsed: TransportResponse = {
      status: response.status,
      headers: response.headers,
      body: await readBody(response),
    };
    logResponse(this.options.logger, request.method, url, response.status, Date.now() - startedAt);

    this.checkResponse(request, category, parsed);
    return parsed;
  }

  private buildUrl(path: string, query?: Record<string, string | undefined>): string {
    const url = `${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`;
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) {
        params.set(key, value);
      }
    }
    const queryString = params.toString();
    return queryString ? `${url}?${queryString}` : url;
  }

  private checkResponse(
    request: TransportRequest,
    category: ServiceCategory | undefined,
    response: TransportResponse
  ): void {
    const { status, headers, body } = response;
    const where = `${request.method} ${request.path}`;

    for (const header of ERROR_HEADERS) {
      const value = headers.get(header);
      if (value !== null) {
        throw this.fail(
          new RequestFailureError(`${where}: ${header}: ${value}`, {
            status,
            responseBody: body,
            isRetryable: false,
            details: { header, value },
          }),
          where
        );
      }
    }

    if (status === 401) {
      throw this.fail(new UnauthorizedError(`${where}: unauthorized request`, body), where);
    }
    if (status === 404) {
      throw this.fail(new NotFoundError(`${where}: not found`, body), where);
    }
    if (status === 429) {
      const retryAfter = parseRetryAfter(
        headers.get('retry-after') ?? headers.get('ratelimit-reset'),
        this.options.logger
      );
      if (category) {
        this.options.rateLimiter.deferUntil(category, Date.now() + retryAfter * 1000);
      }
      throw this.fail(
        new RateLimitError(`${where}: rate limit reached, next request possible in ${retryAfter}s`, retryAfter, body),
        where
      );
    }
    if (status >= 400) {
      throw this.fail(
        new RequestFailureError(`${where}: last request status ${status}`, {
          status,
          responseBody: body,
          isRetryable: status >= 500,
        }),
        where
      );
    }

    const expected = request.expectedStatus;
    const accepted =
      expected === undefined
        ? status >= 200 && status < 300
        : typeof expected === 'number'
          ? status === expected
          : expected.includes(status);
    if (!accepted) {
      throw this.fail(
        new RequestFailureError(`${where}: unexpected status ${status}, expected ${String(expected ?? '2xx')}`, {
          status,
          responseBody: body,
          isRetryable: false,
        }),
        where
      );
    }
  }

  private fail(error: RequestFailureError, where: string): RequestFailureError {
    logError(this.options.logger, error, where);
    return error;
  }
}

/**
 * Maps an API path to its rate-limit category (`/storage/xfer-external/upload` → `storage`)
 */
export function categoryForPath(path: string): ServiceCategory | undefined {
  const segment = path.replace(/^\/+/, '').split(/[/?]/, 1)[0] ?? '';
  return isServiceCategory(segment) ? segment : undefined;
}

/**
 * Parses a Retry-After value given as delta-seconds or an HTTP-date
 */
export function parseRetryAfter(value: string | null, logger?: Logger): number {
  if (value === null) {
    return DEFAULT_RATE_LIMIT_RESET_SECONDS;
  }

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Math.max(Number(trimmed), 0);
  }

  const date = Date.parse(trimmed);
  if (!Number.isNaN(date)) {
    return Math.max((date - Date.now()) / 1000, 0);
  }

  logger?.warn('Could not parse Retry-After header', { value });
  return DEFAULT_RATE_LIMIT_RESET_SECONDS;
}

function encodeBody(
  body: RequestBody | undefined,
  headers: Record<string, string>
): string | FormData | undefined {
  if (!body) {
    return undefined;
  }
  switch (body.type) {
    case 'json':
      headers['content-type'] = 'application/json';
      return JSON.stringify(body.value);
    case 'form':
      headers['content-type'] = 'application/x-www-form-urlencoded';
      return new URLSearchParams(body.fields).toString();
    case 'multipart':
      // fetch sets the multipart boundary itself
      return body.form;
  }
}

async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return undefined;
  }
  try {
    const json: unknown = JSON.parse(text);
    return json;
  } catch {
    return text;
  }
}

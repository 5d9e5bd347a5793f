import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MockFetch } from '../../__mocks__/mock-fetch.js';
import { StaticTokenAuth } from '../../auth/authorization.js';
import {
  NetworkError,
  NotFoundError,
  RateLimitError,
  RequestFailureError,
  UnauthorizedError,
} from '../../errors/categories.js';
import { NoopLogger } from '../../observability/logging.js';
import { RateLimiter } from '../../resilience/rate-limiter.js';
import { FetchHttpTransport, categoryForPath, parseRetryAfter } from '../http-transport.js';

describe('FetchHttpTransport', () => {
  let mock: MockFetch;
  let rateLimiter: RateLimiter;
  let transport: FetchHttpTransport;

  beforeEach(() => {
    mock = new MockFetch();
    rateLimiter = new RateLimiter({ defaultIntervalMs: 0 });
    transport = new FetchHttpTransport({
      baseUrl: 'https://firecrest.example.com/',
      authorization: new StaticTokenAuth('test-token'),
      rateLimiter,
      timeout: 5000,
      headers: { 'User-Agent': 'firecrest-ts/test' },
      fetch: mock.fetch,
      logger: new NoopLogger(),
    });
  });

  it('should send the bearer token, headers and query', async () => {
    mock.enqueueJsonResponse(200, { output: [] });

    const response = await transport.request({
      method: 'GET',
      path: '/utilities/ls',
      headers: { 'X-Machine-Name': 'cluster' },
      query: { targetPath: '/home/user', showhidden: undefined },
    });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ output: [] });
    const request = mock.getLastRequest();
    expect(request?.url).toBe('https://firecrest.example.com/utilities/ls?targetPath=%2Fhome%2Fuser');
    expect(request?.method).toBe('GET');
    expect(request?.headers['authorization']).toBe('Bearer test-token');
    expect(request?.headers['x-machine-name']).toBe('cluster');
    expect(request?.headers['user-agent']).toBe('firecrest-ts/test');
  });

  it('should encode form bodies', async () => {
    mock.enqueueJsonResponse(201, { task_id: '1' });

    await transport.request({
      method: 'POST',
      path: '/storage/xfer-external/download',
      body: { type: 'form', fields: { sourcePath: '/scratch/out file.txt' } },
      expectedStatus: 201,
    });

    const request = mock.getLastRequest();
    expect(request?.body).toBe('sourcePath=%2Fscratch%2Fout+file.txt');
    expect(request?.headers['content-type']).toBe('application/x-www-form-urlencoded');
  });

  it('should wait on the rate limiter of the path category', async () => {
    const wait = vi.spyOn(rateLimiter, 'wait');
    mock.enqueueJsonResponse(200, { tasks: {} });

    await transport.request({ method: 'GET', path: '/tasks' });

    expect(wait).toHaveBeenCalledWith('tasks', undefined);
  });

  it('should return undefined for an empty body and text for a non-JSON body', async () => {
    mock.enqueueTextResponse(201, '');
    mock.enqueueTextResponse(200, 'plain text');

    const empty = await transport.request({ method: 'POST', path: '/storage/xfer-external/invalidate' });
    const text = await transport.request({ method: 'GET', path: '/status/parameters' });

    expect(empty.body).toBeUndefined();
    expect(text.body).toBe('plain text');
  });

  describe('error mapping', () => {
    it('should map 429 to RateLimitError and defer the category', async () => {
      const deferUntil = vi.spyOn(rateLimiter, 'deferUntil');
      mock.enqueueJsonResponse(429, { message: 'slow down' }, { 'Retry-After': '30' });
      const before = Date.now();

      const error = await transport.request({ method: 'GET', path: '/tasks' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitError);
      if (error instanceof RateLimitError) {
        expect(error.retryAfter).toBe(30);
        expect(error.status).toBe(429);
      }
      expect(deferUntil).toHaveBeenCalledTimes(1);
      const [category, until] = deferUntil.mock.calls[0] ?? [];
      expect(category).toBe('tasks');
      expect(until).toBeGreaterThanOrEqual(before + 30000);
      expect(until).toBeLessThanOrEqual(Date.now() + 30000);
    });

    it('should fall back to 10 seconds when a 429 has no reset header', async () => {
      mock.enqueueJsonResponse(429, {});

      await expect(transport.request({ method: 'GET', path: '/compute/jobs' })).rejects.toMatchObject({
        retryAfter: 10,
      });
    });

    it('should map an error header to RequestFailureError', async () => {
      mock.enqueueJsonResponse(
        400,
        { description: 'Error listing contents of path' },
        { 'X-Machine-Does-Not-Exist': 'Machine does not exist' }
      );

      const error = await transport
        .request({ method: 'GET', path: '/utilities/ls' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RequestFailureError);
      if (error instanceof RequestFailureError) {
        expect(error.message).toBe('GET /utilities/ls: X-Machine-Does-Not-Exist: Machine does not exist');
        expect(error.status).toBe(400);
        expect(error.responseBody).toEqual({ description: 'Error listing contents of path' });
      }
    });

    it('should map 401 to UnauthorizedError', async () => {
      mock.enqueueJsonResponse(401, { message: 'Invalid token' });

      await expect(transport.request({ method: 'GET', path: '/tasks' })).rejects.toBeInstanceOf(UnauthorizedError);
    });

    it('should map 404 to NotFoundError', async () => {
      mock.enqueueJsonResponse(404, { message: 'Not found' });

      await expect(transport.request({ method: 'GET', path: '/status/systems/none' })).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    it('should mark server errors as retryable', async () => {
      mock.enqueueJsonResponse(503, { message: 'unavailable' });

      await expect(transport.request({ method: 'GET', path: '/tasks' })).rejects.toMatchObject({
        status: 503,
        isRetryable: true,
        responseBody: { message: 'unavailable' },
      });
    });

    it('should reject a success status other than the expected one', async () => {
      mock.enqueueJsonResponse(200, { task_id: '1' });

      const error = await transport
        .request({ method: 'POST', path: '/storage/xfer-external/upload', expectedStatus: 201 })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RequestFailureError);
      if (error instanceof RequestFailureError) {
        expect(error.message).toBe('POST /storage/xfer-external/upload: unexpected status 200, expected 201');
        expect(error.isRetryable).toBe(false);
      }
    });

    it('should map a failed connection to NetworkError', async () => {
      mock.enqueueNetworkError('connect ECONNREFUSED');

      const error = await transport.request({ method: 'GET', path: '/tasks' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NetworkError);
      if (error instanceof NetworkError) {
        expect(error.message).toBe('GET https://firecrest.example.com/tasks failed');
        expect(error.cause).toBeInstanceOf(TypeError);
      }
    });

    it('should rethrow the reason of a caller abort', async () => {
      const controller = new AbortController();
      controller.abort(new Error('user cancelled'));

      await expect(
        transport.request({ method: 'GET', path: '/tasks', signal: controller.signal })
      ).rejects.toThrow('user cancelled');
      mock.verifyRequestCount(0);
    });
  });
});

describe('categoryForPath', () => {
  it('should use the first path segment', () => {
    expect(categoryForPath('/storage/xfer-external/upload')).toBe('storage');
    expect(categoryForPath('/tasks')).toBe('tasks');
    expect(categoryForPath('compute/jobs/path')).toBe('compute');
  });

  it('should return undefined for paths outside the service categories', () => {
    expect(categoryForPath('/unknown/path')).toBeUndefined();
    expect(categoryForPath('/')).toBeUndefined();
  });
});

describe('parseRetryAfter', () => {
  it('should parse delta-seconds', () => {
    expect(parseRetryAfter('120')).toBe(120);
    expect(parseRetryAfter(' 0 ')).toBe(0);
  });

  it('should parse an HTTP-date relative to now', () => {
    const inOneMinute = new Date(Date.now() + 60000).toUTCString();

    const seconds = parseRetryAfter(inOneMinute);

    expect(seconds).toBeGreaterThan(58);
    expect(seconds).toBeLessThanOrEqual(60);
  });

  it('should default to 10 seconds for a missing or unreadable value', () => {
    expect(parseRetryAfter(null)).toBe(10);
    expect(parseRetryAfter('soon')).toBe(10);
  });
});

/**
 * Queued fetch stand-in for tests.
 *
 * Every call to `fetch` takes the next enqueued response, whatever its URL, and
 * records the request. Enqueue responses in the order the code under test
 * sends its requests.
 */

export interface MockResponse {
  status: number;
  body: string;
  headers?: Record<string, string>;
}

export interface RecordedRequest {
  url: string;
  method: string;
  /** Header names in lower case */
  headers: Record<string, string>;
  body: RequestInit['body'];
}

type QueuedItem = { kind: 'response'; response: MockResponse } | { kind: 'network-error'; message: string };

/**
 * @example
 * ```typescript
 * const mock = new MockFetch();
 * mock.enqueueTask('42', '116');
 * mock.enqueueTask('42', '117', 'https://staging.example.com/obj');
 *
 * const client = createClient({ baseUrl, authorization, fetch: mock.fetch });
 * ```
 */
export class MockFetch {
  private queue: QueuedItem[] = [];
  private requests: RecordedRequest[] = [];

  readonly fetch: typeof fetch = async (input, init = {}) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    this.requests.push({
      url,
      method: init.method ?? 'GET',
      headers: Object.fromEntries(new Headers(init.headers).entries()),
      body: init.body,
    });

    init.signal?.throwIfAborted();

    const item = this.queue.shift();
    if (!item) {
      throw new Error(`No response configured in MockFetch for ${init.method ?? 'GET'} ${url}`);
    }
    if (item.kind === 'network-error') {
      throw new TypeError(item.message);
    }
    return new Response(item.response.body.length > 0 ? item.response.body : null, {
      status: item.response.status,
      headers: item.response.headers,
    });
  };

  enqueueResponse(response: MockResponse): this {
    this.queue.push({ kind: 'response', response });
    return this;
  }

  enqueueJsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): this {
    return this.enqueueResponse({
      status,
      body: JSON.stringify(body),
      headers: { 'content-type': 'application/json', ...headers },
    });
  }

  enqueueTextResponse(status: number, body: string, headers: Record<string, string> = {}): this {
    return this.enqueueResponse({ status, body, headers });
  }

  /**
   * Enqueues a `/tasks` answer for one task
   */
  enqueueTask(taskId: string, status: string, data: unknown = null, description = ''): this {
    return this.enqueueJsonResponse(200, {
      tasks: {
        [taskId]: {
          task_id: taskId,
          hash_id: taskId,
          status,
          description,
          data,
          service: 'storage',
          updated_at: '2024-01-01T00:00:00',
        },
      },
    });
  }

  /**
   * Enqueues the `201 { task_id }` answer of a request that creates a task
   */
  enqueueTaskCreated(taskId: string, status = 201): this {
    return this.enqueueJsonResponse(status, { success: 'Task created', task_id: taskId, task_url: `/tasks/${taskId}` });
  }

  /**
   * Makes the next call reject the way fetch does when the connection fails
   */
  enqueueNetworkError(message = 'fetch failed'): this {
    this.queue.push({ kind: 'network-error', message });
    return this;
  }

  getRequests(): RecordedRequest[] {
    return [...this.requests];
  }

  getLastRequest(): RecordedRequest | undefined {
    return this.requests[this.requests.length - 1];
  }

  /**
   * Requests whose URL contains `fragment`
   */
  requestsTo(fragment: string): RecordedRequest[] {
    return this.requests.filter(request => request.url.includes(fragment));
  }

  /**
   * Verify that exactly the expected number of requests were made.
   *
   * @throws {Error} If the actual count doesn't match expected
   */
  verifyRequestCount(expected: number): void {
    if (this.requests.length !== expected) {
      throw new Error(`Expected ${expected} requests, got ${this.requests.length}`);
    }
  }

  /** Responses enqueued but not consumed yet */
  pendingResponses(): number {
    return this.queue.length;
  }

  clearRequests(): void {
    this.requests = [];
  }
}

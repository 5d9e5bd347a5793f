/**
 * Mock implementations for testing the client without a FirecREST server.
 */

import { StaticTokenAuth } from '../auth/authorization.js';
import { createClient, type ClientDependencies, type FirecrestClient } from '../client/client.js';
import type { PartialFirecrestConfig } from '../config/config.js';
import { MockFetch } from './mock-fetch.js';

export { MockFetch, type MockResponse, type RecordedRequest } from './mock-fetch.js';

export const TEST_BASE_URL = 'https://firecrest.example.com';

/**
 * A client with a static token, no spacing between calls and `mock.fetch` for every request
 */
export function createTestClient(
  mock: MockFetch = new MockFetch(),
  overrides: PartialFirecrestConfig = {},
  dependencies?: ClientDependencies
): { client: FirecrestClient; mock: MockFetch } {
  const client = createClient(
    {
      baseUrl: TEST_BASE_URL,
      authorization: new StaticTokenAuth('test-token'),
      defaultTimeBetweenCalls: 0,
      fetch: mock.fetch,
      ...overrides,
    },
    dependencies
  );
  return { client, mock };
}

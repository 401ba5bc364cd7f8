import { vi, type Mock } from 'vitest';
import { N8nClient, type N8nClientConfig } from '../src/index.js';

export const TEST_BASE_URL = 'https://n8n.test';
export const TEST_API_KEY = 'test-api-key';

export type FetchMock = Mock<typeof fetch>;

export function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });
}

export function createTestClient(
  fetchMock: FetchMock,
  overrides: Partial<N8nClientConfig> = {},
): N8nClient {
  return new N8nClient({
    baseUrl: `${TEST_BASE_URL}/`,
    apiKey: TEST_API_KEY,
    fetch: fetchMock,
    ...overrides,
  });
}

/** A fetch that never settles until its signal aborts */
export function hangingFetch(): FetchMock {
  return vi.fn<typeof fetch>(
    (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(init.signal?.reason));
      }),
  );
}

export function lastRequest(fetchMock: FetchMock): { url: string; init: RequestInit } {
  const call = fetchMock.mock.calls.at(-1);
  if (!call) {
    throw new Error('fetch was not called');
  }
  return { url: String(call[0]), init: call[1] ?? {} };
}

import { N8nClient } from '@n8nkit/sdk';
import { vi, type Mock } from 'vitest';

export type FetchMock = Mock<typeof fetch>;

/** Responses keyed by `METHOD /path` (query string ignored) */
export type Routes = Record<string, () => Response>;

export function reply(body: unknown, init: ResponseInit = {}): () => Response {
  return () =>
    new Response(JSON.stringify(body), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
      ...init,
    });
}

export function failWith(status: number, text = ''): () => Response {
  return () => new Response(text, { status });
}

export function routedFetch(routes: Routes): FetchMock {
  return vi.fn<typeof fetch>(async (input, init) => {
    const url = new URL(String(input));
    const respond = routes[`${init?.method ?? 'GET'} ${url.pathname}`];
    return respond ? respond() : new Response('no route', { status: 404 });
  });
}

export function createTestClient(fetchMock: FetchMock): N8nClient {
  return new N8nClient({ baseUrl: 'https://n8n.test', apiKey: 'test-api-key', fetch: fetchMock });
}

/** `METHOD /path?query` of every request, in order */
export function requestLines(fetchMock: FetchMock): string[] {
  return fetchMock.mock.calls.map(([input, init]) => {
    const url = new URL(String(input));
    return `${init?.method ?? 'GET'} ${url.pathname}${url.search}`;
  });
}

export function requestBody(fetchMock: FetchMock, index: number): unknown {
  const body = fetchMock.mock.calls[index]?.[1]?.body;
  return typeof body === 'string' ? JSON.parse(body) : undefined;
}

export function sourceWorkflow(): Record<string, unknown> {
  return {
    id: 'wf-1',
    name: 'Order Sync',
    active: true,
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-02T00:00:00.000Z',
    versionId: 'version-1',
    tags: [{ id: 't1', name: 'billing' }],
    nodes: [
      {
        id: 'node-1',
        name: 'Start',
        type: 'n8n-nodes-base.manualTrigger',
        typeVersion: 1,
        position: [250, 300],
        parameters: {},
      },
    ],
    connections: {},
    settings: { timezone: 'UTC' },
  };
}

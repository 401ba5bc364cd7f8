import type { Logger } from '@n8nkit/logger';
import { CredentialsResource } from './resources/credentials.js';
import { ExecutionsResource } from './resources/executions.js';
import { TagsResource } from './resources/tags.js';
import { WorkflowsResource } from './resources/workflows.js';
import type { ApiErrorResult, ApiResult } from './types/results.js';

export const DEFAULT_TIMEOUT_MS = 30_000;

export const API_KEY_HEADER = 'X-N8N-API-KEY';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface RequestOptions {
  body?: unknown;
  query?: Record<string, string | number | boolean | undefined>;
}

/** What resource classes need from the client */
export interface Transport {
  request<T>(method: HttpMethod, path: string, options?: RequestOptions): Promise<ApiResult<T>>;
}

export interface N8nClientConfig {
  /** Base URL of the n8n instance, e.g. http://localhost:5678 */
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

class TimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

class ClientClosedError extends Error {
  constructor() {
    super('Client closed before the request completed');
    this.name = 'ClientClosedError';
  }
}

/**
 * Client for the n8n public REST API (v1).
 *
 * Every call issues exactly one request and resolves to either the decoded
 * JSON body or an {@link ApiErrorResult}; it never rejects.
 */
export class N8nClient implements Transport {
  readonly baseUrl: string;
  readonly workflows: WorkflowsResource;
  readonly executions: ExecutionsResource;
  readonly credentials: CredentialsResource;
  readonly tags: TagsResource;

  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger?: Logger;
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  constructor(config: N8nClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? fetch;
    this.logger = config.logger?.child({ component: 'n8n_client' });

    this.workflows = new WorkflowsResource(this);
    this.executions = new ExecutionsResource(this);
    this.credentials = new CredentialsResource(this);
    this.tags = new TagsResource(this);
  }

  get headers(): Record<string, string> {
    return {
      [API_KEY_HEADER]: this.apiKey,
      Accept: 'application/json',
    };
  }

  async request<T>(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {},
  ): Promise<ApiResult<T>> {
    const url = this.buildUrl(path, options.query);

    if (this.closed) {
      return this.fail(method, path, {
        error: 'Network error',
        message: new ClientClosedError().message,
      });
    }

    const controller = new AbortController();
    this.inFlight.add(controller);
    const timer = setTimeout(
      () => controller.abort(new TimeoutError(this.timeoutMs)),
      this.timeoutMs,
    );

    const headers: Record<string, string> = { ...this.headers };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    this.logger?.debug('n8n_request', { method, path });

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method,
          headers,
          body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
          signal: controller.signal,
        });
      } catch (error) {
        return this.fail(method, path, {
          error: 'Network error',
          message: describeAbort(controller.signal) ?? errorMessage(error),
        });
      }

      const text = await response.text();

      if (!response.ok) {
        return this.fail(method, path, {
          error: `HTTP ${response.status}`,
          message: `${method} ${path} failed with status ${response.status} ${response.statusText}`
            .trim(),
          details: text,
        });
      }

      // DELETE and some POST endpoints may answer with an empty body
      return JSON.parse(text.trim() === '' ? '{}' : text) as T;
    } catch (error) {
      const aborted = describeAbort(controller.signal);
      return this.fail(
        method,
        path,
        aborted
          ? { error: 'Network error', message: aborted }
          : { error: 'Unknown error', message: errorMessage(error) },
      );
    } finally {
      clearTimeout(timer);
      this.inFlight.delete(controller);
    }
  }

  /** Abort in-flight requests; later calls resolve to a network error */
  close(): void {
    this.closed = true;
    for (const controller of this.inFlight) {
      controller.abort(new ClientClosedError());
    }
    this.inFlight.clear();
  }

  private buildUrl(path: string, query?: RequestOptions['query']): string {
    let url = `${this.baseUrl}${path}`;
    if (query) {
      const searchParams = new URLSearchParams();
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          searchParams.set(key, String(value));
        }
      }
      const queryString = searchParams.toString();
      if (queryString) {
        url += `?${queryString}`;
      }
    }
    return url;
  }

  private fail(method: HttpMethod, path: string, result: ApiErrorResult): ApiErrorResult {
    this.logger?.warn('n8n_request_failed', {
      method,
      path,
      error: result.error,
      message: result.message,
    });
    return result;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Message for a request we aborted ourselves (timeout or close), if any */
function describeAbort(signal: AbortSignal): string | undefined {
  if (!signal.aborted) return undefined;
  return signal.reason instanceof Error ? signal.reason.message : 'Request aborted';
}

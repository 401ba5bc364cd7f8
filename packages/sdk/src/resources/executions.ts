import type { Transport } from '../client.js';
import type { Execution, ExecutionList, ExecutionListQuery } from '../types/executions.js';
import type { ApiResult } from '../types/results.js';

const BASE_PATH = '/api/v1/executions';

export const DEFAULT_EXECUTION_LIMIT = 20;

export class ExecutionsResource {
  constructor(private transport: Transport) {}

  /** Most recent executions first, optionally for one workflow */
  async list(query: ExecutionListQuery = {}): Promise<ApiResult<ExecutionList>> {
    return this.transport.request<ExecutionList>('GET', BASE_PATH, {
      query: {
        limit: query.limit ?? DEFAULT_EXECUTION_LIMIT,
        workflowId: query.workflowId || undefined,
      },
    });
  }

  async get(executionId: string): Promise<ApiResult<Execution>> {
    return this.transport.request<Execution>(
      'GET',
      `${BASE_PATH}/${encodeURIComponent(executionId)}`,
    );
  }

  async delete(executionId: string): Promise<ApiResult<Execution>> {
    return this.transport.request<Execution>(
      'DELETE',
      `${BASE_PATH}/${encodeURIComponent(executionId)}`,
    );
  }

  async retry(executionId: string): Promise<ApiResult<Execution>> {
    return this.transport.request<Execution>(
      'POST',
      `${BASE_PATH}/${encodeURIComponent(executionId)}/retry`,
    );
  }
}

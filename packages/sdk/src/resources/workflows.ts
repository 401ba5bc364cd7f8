import type { Transport } from '../client.js';
import type { ApiResult } from '../types/results.js';
import type { Tag } from '../types/tags.js';
import type { Workflow, WorkflowInput, WorkflowList } from '../types/workflows.js';

const BASE_PATH = '/api/v1/workflows';

function workflowPath(workflowId: string, suffix = ''): string {
  return `${BASE_PATH}/${encodeURIComponent(workflowId)}${suffix}`;
}

export class WorkflowsResource {
  constructor(private transport: Transport) {}

  async list(): Promise<ApiResult<WorkflowList>> {
    return this.transport.request<WorkflowList>('GET', BASE_PATH);
  }

  async get(workflowId: string): Promise<ApiResult<Workflow>> {
    return this.transport.request<Workflow>('GET', workflowPath(workflowId));
  }

  async create(workflow: WorkflowInput): Promise<ApiResult<Workflow>> {
    return this.transport.request<Workflow>('POST', BASE_PATH, { body: workflow });
  }

  async update(workflowId: string, workflow: WorkflowInput): Promise<ApiResult<Workflow>> {
    return this.transport.request<Workflow>('PUT', workflowPath(workflowId), {
      body: workflow,
    });
  }

  async delete(workflowId: string): Promise<ApiResult<Workflow>> {
    return this.transport.request<Workflow>('DELETE', workflowPath(workflowId));
  }

  /** Trigger a run; `data` is passed to the workflow as input */
  async execute(
    workflowId: string,
    data: Record<string, unknown> = {},
  ): Promise<ApiResult<Record<string, unknown>>> {
    return this.transport.request<Record<string, unknown>>(
      'POST',
      workflowPath(workflowId, '/execute'),
      { body: data },
    );
  }

  async setActive(workflowId: string, active: boolean): Promise<ApiResult<Workflow>> {
    return this.transport.request<Workflow>('PATCH', workflowPath(workflowId), {
      body: { active },
    });
  }

  async deactivate(workflowId: string): Promise<ApiResult<Workflow>> {
    return this.transport.request<Workflow>(
      'POST',
      workflowPath(workflowId, '/deactivate'),
    );
  }

  async getVersion(workflowId: string, versionId: string): Promise<ApiResult<Workflow>> {
    return this.transport.request<Workflow>(
      'GET',
      workflowPath(workflowId, `/${encodeURIComponent(versionId)}`),
    );
  }

  async transfer(workflowId: string, destinationProjectId: string): Promise<ApiResult<Workflow>> {
    return this.transport.request<Workflow>(
      'PUT',
      workflowPath(workflowId, '/transfer'),
      { body: { destinationProjectId } },
    );
  }

  async getTags(workflowId: string): Promise<ApiResult<Tag[]>> {
    return this.transport.request<Tag[]>('GET', workflowPath(workflowId, '/tags'));
  }

  async updateTags(workflowId: string, tagIds: string[]): Promise<ApiResult<Tag[]>> {
    return this.transport.request<Tag[]>('PUT', workflowPath(workflowId, '/tags'), {
      body: { tags: tagIds },
    });
  }
}

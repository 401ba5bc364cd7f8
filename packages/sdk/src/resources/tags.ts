import type { Transport } from '../client.js';
import type { ApiResult } from '../types/results.js';
import type { Tag, TagInput, TagList } from '../types/tags.js';

const BASE_PATH = '/api/v1/tags';

export class TagsResource {
  constructor(private transport: Transport) {}

  async list(): Promise<ApiResult<TagList>> {
    return this.transport.request<TagList>('GET', BASE_PATH);
  }

  async create(tag: TagInput): Promise<ApiResult<Tag>> {
    return this.transport.request<Tag>('POST', BASE_PATH, { body: tag });
  }

  async get(tagId: string): Promise<ApiResult<Tag>> {
    return this.transport.request<Tag>('GET', `${BASE_PATH}/${encodeURIComponent(tagId)}`);
  }

  async update(tagId: string, tag: TagInput): Promise<ApiResult<Tag>> {
    return this.transport.request<Tag>('PUT', `${BASE_PATH}/${encodeURIComponent(tagId)}`, {
      body: tag,
    });
  }

  async delete(tagId: string): Promise<ApiResult<Tag>> {
    return this.transport.request<Tag>('DELETE', `${BASE_PATH}/${encodeURIComponent(tagId)}`);
  }
}

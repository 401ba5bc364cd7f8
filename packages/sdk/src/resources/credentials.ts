import type { Transport } from '../client.js';
import type {
  Credential,
  CredentialInput,
  CredentialList,
  CredentialSchema,
} from '../types/credentials.js';
import type { ApiResult } from '../types/results.js';

const BASE_PATH = '/api/v1/credentials';

/** Credential secrets are write-only; the API redacts them on read */
export class CredentialsResource {
  constructor(private transport: Transport) {}

  async list(): Promise<ApiResult<CredentialList>> {
    return this.transport.request<CredentialList>('GET', BASE_PATH);
  }

  async create(credential: CredentialInput): Promise<ApiResult<Credential>> {
    return this.transport.request<Credential>('POST', BASE_PATH, { body: credential });
  }

  async update(credentialId: string, credential: CredentialInput): Promise<ApiResult<Credential>> {
    return this.transport.request<Credential>(
      'PATCH',
      `${BASE_PATH}/${encodeURIComponent(credentialId)}`,
      { body: credential },
    );
  }

  async delete(credentialId: string): Promise<ApiResult<Credential>> {
    return this.transport.request<Credential>(
      'DELETE',
      `${BASE_PATH}/${encodeURIComponent(credentialId)}`,
    );
  }

  async getSchema(credentialTypeName: string): Promise<ApiResult<CredentialSchema>> {
    return this.transport.request<CredentialSchema>(
      'GET',
      `${BASE_PATH}/schema/${encodeURIComponent(credentialTypeName)}`,
    );
  }

  async transfer(
    credentialId: string,
    destinationProjectId: string,
  ): Promise<ApiResult<Credential>> {
    return this.transport.request<Credential>(
      'PUT',
      `${BASE_PATH}/${encodeURIComponent(credentialId)}/transfer`,
      { body: { destinationProjectId } },
    );
  }
}

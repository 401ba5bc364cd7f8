/**
 * @n8nkit/sdk - Client for the n8n public REST API
 *
 * @example
 * ```typescript
 * import { N8nClient, isApiError } from '@n8nkit/sdk';
 *
 * const client = new N8nClient({ baseUrl: 'http://localhost:5678', apiKey });
 * const workflow = await client.workflows.get('wf-1');
 * if (isApiError(workflow)) {
 *   console.error(workflow.error, workflow.message);
 * }
 * ```
 */

export {
  API_KEY_HEADER,
  DEFAULT_TIMEOUT_MS,
  N8nClient,
  type HttpMethod,
  type N8nClientConfig,
  type RequestOptions,
  type Transport,
} from './client.js';

export { CredentialsResource } from './resources/credentials.js';
export { DEFAULT_EXECUTION_LIMIT, ExecutionsResource } from './resources/executions.js';
export { TagsResource } from './resources/tags.js';
export { WorkflowsResource } from './resources/workflows.js';

export type {
  Credential,
  CredentialInput,
  CredentialList,
  CredentialSchema,
} from './types/credentials.js';
export type {
  Execution,
  ExecutionList,
  ExecutionListQuery,
  ExecutionStatus,
} from './types/executions.js';
export { isApiError, type ApiErrorResult, type ApiResult } from './types/results.js';
export type { Tag, TagInput, TagList } from './types/tags.js';
export type {
  Workflow,
  WorkflowInput,
  WorkflowList,
  WorkflowNode,
  WorkflowSettings,
} from './types/workflows.js';

import { prepareClone } from '@n8nkit/core';
import { isApiError, type ApiErrorResult, type Workflow } from '@n8nkit/sdk';
import type { N8nApi } from '../tool.js';

export interface CloneResult {
  cloned_workflow: Workflow;
  source_workflow_id: string;
  fields_removed: string[];
}

/**
 * Copy a workflow under a new name. Read-only fields are dropped, credentials
 * keep pointing at the same ids, tags and execution history are not copied.
 */
export async function cloneWorkflow(
  client: N8nApi,
  sourceWorkflowId: string,
  newName: string,
  activate = false,
): Promise<CloneResult | ApiErrorResult> {
  const source = await client.workflows.get(sourceWorkflowId);
  if (isApiError(source)) return source;

  const { workflow, fieldsRemoved } = prepareClone(source, newName);

  const created = await client.workflows.create(workflow);
  if (isApiError(created)) return created;

  let cloned = created;
  if (activate && created.id) {
    const activated = await client.workflows.setActive(created.id, true);
    // A failed activation still leaves a usable (inactive) clone
    if (!isApiError(activated)) cloned = activated;
  }

  return {
    cloned_workflow: cloned,
    source_workflow_id: sourceWorkflowId,
    fields_removed: fieldsRemoved,
  };
}

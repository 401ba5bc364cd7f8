import { analyzeHealth, type HealthReport } from '@n8nkit/core';
import { isApiError, type ApiErrorResult } from '@n8nkit/sdk';
import type { N8nApi } from '../tool.js';

/**
 * Fetch a workflow and its recent executions, then score them. The first
 * upstream failure is returned as-is and nothing is analyzed.
 */
export async function getWorkflowHealth(
  client: N8nApi,
  workflowId: string,
  executionLimit?: number,
): Promise<HealthReport | ApiErrorResult> {
  const workflow = await client.workflows.get(workflowId);
  if (isApiError(workflow)) return workflow;

  const executions = await client.executions.list({ workflowId, limit: executionLimit });
  if (isApiError(executions)) return executions;

  return analyzeHealth(workflow, executions.data ?? [], { workflowId });
}

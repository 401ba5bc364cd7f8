import { z } from 'zod';
import { defineTool, type N8nApi, type Tool } from '../tool.js';
import { executionId } from './schemas.js';

export function executionTools(client: N8nApi): Tool[] {
  return [
    defineTool({
      name: 'get_executions',
      description: 'List recent executions, optionally for a single workflow.',
      schema: z.object({
        workflow_id: z.string().optional().describe('Only executions of this workflow'),
        limit: z
          .number()
          .int()
          .positive()
          .default(20)
          .describe('Maximum number of executions (default: 20)'),
      }),
      handler: async (args) =>
        client.executions.list({ workflowId: args.workflow_id, limit: args.limit }),
    }),

    defineTool({
      name: 'get_execution',
      description: 'Get an execution by ID.',
      schema: z.object({ execution_id: executionId }),
      handler: async (args) => client.executions.get(args.execution_id),
    }),

    defineTool({
      name: 'delete_execution',
      description: 'Delete an execution.',
      schema: z.object({ execution_id: executionId }),
      handler: async (args) => client.executions.delete(args.execution_id),
    }),

    defineTool({
      name: 'retry_execution',
      description: 'Retry a failed execution.',
      schema: z.object({ execution_id: executionId }),
      handler: async (args) => client.executions.retry(args.execution_id),
    }),
  ];
}

import { filterWorkflows, validateWorkflow } from '@n8nkit/core';
import { isApiError } from '@n8nkit/sdk';
import { z } from 'zod';
import { parseJson, parseJsonObject, parseJsonStringArray } from '../json-args.js';
import { cloneWorkflow } from '../operations/clone.js';
import { getWorkflowHealth } from '../operations/health.js';
import { defineTool, type N8nApi, type Tool } from '../tool.js';
import { destinationProjectId, executionLimit, jsonArgument, workflowId } from './schemas.js';

export function workflowTools(client: N8nApi): Tool[] {
  return [
    defineTool({
      name: 'list_workflows',
      description:
        'List workflows. Optional filters are combined with AND: name substring ' +
        '(case-insensitive), active state, and tag ids that must all be present.',
      schema: z.object({
        name_contains: z.string().optional().describe('Case-insensitive name substring'),
        active: z.boolean().optional().describe('Only active (true) or inactive (false) workflows'),
        tag_ids: jsonArgument('array of tag ids, e.g. ["tag1", "tag2"]').optional(),
      }),
      handler: async (args) => {
        const tagIds = args.tag_ids ? parseJsonStringArray('tag_ids', args.tag_ids) : undefined;

        const result = await client.workflows.list();
        if (isApiError(result)) return result;

        return {
          ...result,
          data: filterWorkflows(result.data ?? [], {
            nameContains: args.name_contains,
            active: args.active,
            tagIds,
          }),
        };
      },
    }),

    defineTool({
      name: 'get_workflow',
      description: 'Get a workflow by ID, including its nodes and connections.',
      schema: z.object({ workflow_id: workflowId }),
      handler: async (args) => client.workflows.get(args.workflow_id),
    }),

    defineTool({
      name: 'execute_workflow',
      description: 'Execute a workflow by ID, optionally passing input data.',
      schema: z.object({
        workflow_id: workflowId,
        data: jsonArgument('object passed to the workflow as input').optional(),
      }),
      handler: async (args) => {
        const data = args.data ? parseJsonObject('data', args.data) : {};
        return client.workflows.execute(args.workflow_id, data);
      },
    }),

    defineTool({
      name: 'activate_workflow',
      description: 'Activate (true) or deactivate (false) a workflow.',
      schema: z.object({
        workflow_id: workflowId,
        active: z.boolean().describe('True to activate, false to deactivate'),
      }),
      handler: async (args) => client.workflows.setActive(args.workflow_id, args.active),
    }),

    defineTool({
      name: 'deactivate_workflow',
      description: 'Deactivate a workflow.',
      schema: z.object({ workflow_id: workflowId }),
      handler: async (args) => client.workflows.deactivate(args.workflow_id),
    }),

    defineTool({
      name: 'validate_workflow',
      description:
        'Check a workflow definition locally before create_workflow or update_workflow. ' +
        'Reports errors (the API would reject the workflow) and warnings (likely problems): ' +
        'forbidden read-only fields, missing required fields, malformed nodes, dangling ' +
        'connections, credentials referenced by name and missing executionOrder.',
      schema: z.object({ workflow_data: jsonArgument('workflow definition') }),
      handler: async (args) => validateWorkflow(parseJson(args.workflow_data)),
    }),

    defineTool({
      name: 'create_workflow',
      description:
        'Create a workflow. Requires name, nodes and connections; read-only fields such as ' +
        'id, active or createdAt are rejected by n8n. Run validate_workflow first.',
      schema: z.object({ workflow_data: jsonArgument('workflow definition') }),
      handler: async (args) =>
        client.workflows.create(parseJsonObject('workflow_data', args.workflow_data)),
    }),

    defineTool({
      name: 'update_workflow',
      description: 'Replace a workflow definition. The same field rules as create_workflow apply.',
      schema: z.object({
        workflow_id: workflowId,
        workflow_data: jsonArgument('workflow definition'),
      }),
      handler: async (args) =>
        client.workflows.update(
          args.workflow_id,
          parseJsonObject('workflow_data', args.workflow_data),
        ),
    }),

    defineTool({
      name: 'delete_workflow',
      description: 'Delete a workflow.',
      schema: z.object({ workflow_id: workflowId }),
      handler: async (args) => client.workflows.delete(args.workflow_id),
    }),

    defineTool({
      name: 'get_workflow_version',
      description: 'Get a specific historical version of a workflow.',
      schema: z.object({
        workflow_id: workflowId,
        version_id: z.string().min(1).describe('The version ID'),
      }),
      handler: async (args) => client.workflows.getVersion(args.workflow_id, args.version_id),
    }),

    defineTool({
      name: 'transfer_workflow',
      description: 'Move a workflow to another project.',
      schema: z.object({
        workflow_id: workflowId,
        destination_project_id: destinationProjectId,
      }),
      handler: async (args) =>
        client.workflows.transfer(args.workflow_id, args.destination_project_id),
    }),

    defineTool({
      name: 'get_workflow_tags',
      description: 'List the tags attached to a workflow.',
      schema: z.object({ workflow_id: workflowId }),
      handler: async (args) => client.workflows.getTags(args.workflow_id),
    }),

    defineTool({
      name: 'update_workflow_tags',
      description: 'Replace the tags attached to a workflow.',
      schema: z.object({
        workflow_id: workflowId,
        tag_ids: jsonArgument('array of tag ids, e.g. ["tag1", "tag2"]'),
      }),
      handler: async (args) =>
        client.workflows.updateTags(args.workflow_id, parseJsonStringArray('tag_ids', args.tag_ids)),
    }),

    defineTool({
      name: 'get_workflow_health',
      description:
        'Score a workflow from its recent executions: healthy (>95% success), degraded ' +
        '(80-95%), unhealthy (<80%) or unknown (no history), with issues and recommendations.',
      schema: z.object({ workflow_id: workflowId, execution_limit: executionLimit }),
      handler: async (args) => getWorkflowHealth(client, args.workflow_id, args.execution_limit),
    }),

    defineTool({
      name: 'clone_workflow',
      description:
        'Copy a workflow under a new name, dropping read-only fields. Credentials keep the ' +
        'same ids; tags and execution history are not copied.',
      schema: z.object({
        source_workflow_id: z.string().min(1).describe('The ID of the workflow to clone'),
        new_name: z.string().min(1).describe('Name for the cloned workflow'),
        activate: z.boolean().default(false).describe('Activate the clone (default: false)'),
      }),
      handler: async (args) =>
        cloneWorkflow(client, args.source_workflow_id, args.new_name, args.activate),
    }),
  ];
}

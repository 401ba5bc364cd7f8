import { z } from 'zod';
import { parseJsonObject } from '../json-args.js';
import { defineTool, type N8nApi, type Tool } from '../tool.js';
import { credentialId, destinationProjectId, jsonArgument } from './schemas.js';

export function credentialTools(client: N8nApi): Tool[] {
  return [
    defineTool({
      name: 'list_credentials',
      description: 'List credentials (metadata only, never secret values).',
      schema: z.object({}),
      handler: async () => client.credentials.list(),
    }),

    defineTool({
      name: 'create_credential',
      description:
        'Create a credential. Use get_credential_schema to see the fields a type expects.',
      schema: z.object({
        credential_data: jsonArgument('object with name, type and data'),
      }),
      handler: async (args) =>
        client.credentials.create(parseJsonObject('credential_data', args.credential_data)),
    }),

    defineTool({
      name: 'update_credential',
      description: 'Update a credential.',
      schema: z.object({
        credential_id: credentialId,
        credential_data: jsonArgument('fields to update'),
      }),
      handler: async (args) =>
        client.credentials.update(
          args.credential_id,
          parseJsonObject('credential_data', args.credential_data),
        ),
    }),

    defineTool({
      name: 'delete_credential',
      description: 'Delete a credential.',
      schema: z.object({ credential_id: credentialId }),
      handler: async (args) => client.credentials.delete(args.credential_id),
    }),

    defineTool({
      name: 'get_credential_schema',
      description: 'Get the JSON schema of a credential type, e.g. httpBasicAuth.',
      schema: z.object({
        credential_type_name: z.string().min(1).describe('Credential type name'),
      }),
      handler: async (args) => client.credentials.getSchema(args.credential_type_name),
    }),

    defineTool({
      name: 'transfer_credential',
      description: 'Move a credential to another project.',
      schema: z.object({
        credential_id: credentialId,
        destination_project_id: destinationProjectId,
      }),
      handler: async (args) =>
        client.credentials.transfer(args.credential_id, args.destination_project_id),
    }),
  ];
}

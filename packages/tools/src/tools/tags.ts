import { z } from 'zod';
import { parseJsonObject } from '../json-args.js';
import { defineTool, type N8nApi, type Tool } from '../tool.js';
import { jsonArgument, tagId } from './schemas.js';

export function tagTools(client: N8nApi): Tool[] {
  return [
    defineTool({
      name: 'list_tags',
      description: 'List all tags.',
      schema: z.object({}),
      handler: async () => client.tags.list(),
    }),

    defineTool({
      name: 'create_tag',
      description: 'Create a tag.',
      schema: z.object({ tag_data: jsonArgument('object with the tag name, e.g. {"name": "billing"}') }),
      handler: async (args) => client.tags.create(parseJsonObject('tag_data', args.tag_data)),
    }),

    defineTool({
      name: 'get_tag',
      description: 'Get a tag by ID.',
      schema: z.object({ tag_id: tagId }),
      handler: async (args) => client.tags.get(args.tag_id),
    }),

    defineTool({
      name: 'update_tag',
      description: 'Rename a tag.',
      schema: z.object({ tag_id: tagId, tag_data: jsonArgument('fields to update') }),
      handler: async (args) => client.tags.update(args.tag_id, parseJsonObject('tag_data', args.tag_data)),
    }),

    defineTool({
      name: 'delete_tag',
      description: 'Delete a tag.',
      schema: z.object({ tag_id: tagId }),
      handler: async (args) => client.tags.delete(args.tag_id),
    }),
  ];
}

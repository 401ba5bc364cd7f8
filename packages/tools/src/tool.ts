import type { N8nClient } from '@n8nkit/sdk';
import type { z } from 'zod';

/** The parts of the client the tools call into */
export type N8nApi = Pick<N8nClient, 'workflows' | 'executions' | 'credentials' | 'tags'>;

export interface ToolDefinition<S extends z.ZodType> {
  /** Stable snake_case name exposed to MCP clients */
  name: string;
  description: string;
  schema: S;
  handler(args: z.output<S>): Promise<unknown>;
}

/** A tool with its argument parsing bound in; `run` takes raw arguments */
export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly schema: z.ZodType;
  run(args: unknown): Promise<unknown>;
}

export function defineTool<S extends z.ZodType>(definition: ToolDefinition<S>): Tool {
  const { name, description, schema } = definition;
  return {
    name,
    description,
    schema,
    run: async (args) => definition.handler(schema.parse(args ?? {})),
  };
}

import type { Logger } from '@n8nkit/logger';
import { isApiError } from '@n8nkit/sdk';
import { JSON_RPC_ERROR, McpProtocolError } from './errors.js';
import { handleErrors } from './handle-errors.js';
import type { N8nApi, Tool } from './tool.js';
import { credentialTools } from './tools/credentials.js';
import { executionTools } from './tools/executions.js';
import { tagTools } from './tools/tags.js';
import { workflowTools } from './tools/workflows.js';

/**
 * Named tools, each wrapped so a call resolves to a result or an error value
 * and never rejects. Unknown tool names are a protocol error.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();
  private readonly logger?: Logger;

  constructor(tools: readonly Tool[], logger?: Logger) {
    this.logger = logger?.child({ component: 'tool_registry' });

    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        throw new Error(`Duplicate tool name: ${tool.name}`);
      }
      this.tools.set(tool.name, {
        name: tool.name,
        description: tool.description,
        schema: tool.schema,
        run: handleErrors((args: unknown) => tool.run(args)),
      });
    }
  }

  list(): Tool[] {
    return [...this.tools.values()];
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  async call(name: string, args: unknown = {}): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new McpProtocolError(JSON_RPC_ERROR.INVALID_PARAMS, `Unknown tool: ${name}`);
    }

    const startedAt = Date.now();
    this.logger?.debug('tool_call_started', { tool: name });

    const result = await tool.run(args);
    const duration_ms = Date.now() - startedAt;

    if (isApiError(result)) {
      this.logger?.warn('tool_call_failed', {
        tool: name,
        duration_ms,
        error: result.error,
        message: result.message,
      });
    } else {
      this.logger?.info('tool_call_completed', { tool: name, duration_ms });
    }

    return result;
  }
}

export interface ToolRegistryOptions {
  client: N8nApi;
  logger?: Logger;
}

/** Every n8n tool, bound to one client */
export function createToolRegistry({ client, logger }: ToolRegistryOptions): ToolRegistry {
  return new ToolRegistry(
    [
      ...workflowTools(client),
      ...executionTools(client),
      ...credentialTools(client),
      ...tagTools(client),
    ],
    logger,
  );
}

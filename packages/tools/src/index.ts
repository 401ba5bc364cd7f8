/**
 * @n8nkit/tools - n8n operations as MCP tools
 *
 * @example
 * ```typescript
 * import { N8nClient } from '@n8nkit/sdk';
 * import { McpServer, createToolRegistry, serveStdio } from '@n8nkit/tools';
 *
 * const client = new N8nClient({ baseUrl, apiKey });
 * const server = new McpServer({ registry: createToolRegistry({ client }) });
 * await serveStdio(server);
 * ```
 */

export { JSON_RPC_ERROR, McpProtocolError, ToolInputError, type JsonRpcErrorCode } from './errors.js';
export { handleErrors, toErrorResult } from './handle-errors.js';
export { parseJson, parseJsonObject, parseJsonStringArray } from './json-args.js';
export * from './mcp/index.js';
export { cloneWorkflow, getWorkflowHealth, type CloneResult } from './operations/index.js';
export { ToolRegistry, createToolRegistry, type ToolRegistryOptions } from './registry.js';
export { defineTool, type N8nApi, type Tool, type ToolDefinition } from './tool.js';

/**
 * MCP server
 *
 * Answers JSON-RPC 2.0 messages for the tool subset of the Model Context
 * Protocol: initialize, tools/list, tools/call and ping. Transport-agnostic;
 * see stdio.ts for the line-based stdio transport.
 */

import type { Logger } from '@n8nkit/logger';
import { isApiError } from '@n8nkit/sdk';
import { z } from 'zod';
import { JSON_RPC_ERROR, McpProtocolError } from '../errors.js';
import type { ToolRegistry } from '../registry.js';
import {
  PROTOCOL_VERSION,
  jsonRpcMessageSchema,
  toolsCallParamsSchema,
  type InitializeResult,
  type JsonRpcError,
  type JsonRpcId,
  type JsonRpcMessage,
  type JsonRpcResponse,
  type McpToolDescriptor,
  type McpToolResult,
} from './protocol.js';

export interface McpServerConfig {
  registry: ToolRegistry;
  /** Server name reported to clients */
  name?: string;
  version?: string;
  logger?: Logger;
}

export class McpServer {
  readonly name: string;
  readonly version: string;
  private readonly registry: ToolRegistry;
  private readonly logger?: Logger;

  constructor(config: McpServerConfig) {
    this.registry = config.registry;
    this.name = config.name ?? 'n8nkit';
    this.version = config.version ?? '0.1.0';
    this.logger = config.logger?.child({ component: 'mcp_server' });
  }

  /**
   * Handle one raw message. Resolves to the response to send back, or
   * undefined for notifications.
   */
  async handleMessage(raw: string): Promise<JsonRpcResponse | undefined> {
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      this.logger?.warn('mcp_parse_error', { error });
      return this.errorResponse(null, { code: JSON_RPC_ERROR.PARSE_ERROR, message: 'Parse error' });
    }

    const parsed = jsonRpcMessageSchema.safeParse(payload);
    if (!parsed.success) {
      return this.errorResponse(extractId(payload), {
        code: JSON_RPC_ERROR.INVALID_REQUEST,
        message: 'Invalid request',
      });
    }

    const message = parsed.data;
    if (message.id === undefined) {
      this.handleNotification(message);
      return undefined;
    }

    return this.handleRequest({ ...message, id: message.id });
  }

  async handleRequest(request: JsonRpcMessage & { id: JsonRpcId }): Promise<JsonRpcResponse> {
    this.logger?.debug('mcp_request', { method: request.method, id: request.id });

    try {
      const result = await this.dispatch(request.method, request.params);
      return { jsonrpc: '2.0', id: request.id, result };
    } catch (error) {
      const formatted = this.formatError(error);
      this.logger?.warn('mcp_request_failed', {
        method: request.method,
        code: formatted.code,
        message: formatted.message,
      });
      return this.errorResponse(request.id, formatted);
    }
  }

  private handleNotification(message: JsonRpcMessage): void {
    this.logger?.debug('mcp_notification', { method: message.method });
  }

  private async dispatch(method: string, params: unknown): Promise<unknown> {
    switch (method) {
      case 'initialize':
        return this.handleInitialize();

      case 'tools/list':
        return this.handleToolsList();

      case 'tools/call':
        return this.handleToolsCall(params);

      case 'ping':
        return {};

      default:
        throw new McpProtocolError(JSON_RPC_ERROR.METHOD_NOT_FOUND, `Unknown method: ${method}`);
    }
  }

  private handleInitialize(): InitializeResult {
    return {
      protocolVersion: PROTOCOL_VERSION,
      capabilities: { tools: {} },
      serverInfo: { name: this.name, version: this.version },
    };
  }

  private handleToolsList(): { tools: McpToolDescriptor[] } {
    return {
      tools: this.registry.list().map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: { ...z.toJSONSchema(tool.schema, { io: 'input' }) },
      })),
    };
  }

  private async handleToolsCall(params: unknown): Promise<McpToolResult> {
    const parsed = toolsCallParamsSchema.safeParse(params);
    if (!parsed.success) {
      throw new McpProtocolError(JSON_RPC_ERROR.INVALID_PARAMS, 'Invalid tools/call params', {
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }

    const { name, arguments: args } = parsed.data;
    const result = await this.registry.call(name, args ?? {});

    return {
      content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
      ...(isApiError(result) ? { isError: true } : {}),
    };
  }

  private formatError(error: unknown): JsonRpcError {
    if (error instanceof McpProtocolError) {
      return error.data === undefined
        ? { code: error.code, message: error.message }
        : { code: error.code, message: error.message, data: error.data };
    }

    return {
      code: JSON_RPC_ERROR.INTERNAL_ERROR,
      message: error instanceof Error ? error.message : 'Internal error',
    };
  }

  private errorResponse(id: JsonRpcId, error: JsonRpcError): JsonRpcResponse {
    return { jsonrpc: '2.0', id, error };
  }
}

/** Best-effort id of a message that failed validation */
function extractId(payload: unknown): JsonRpcId {
  if (typeof payload === 'object' && payload !== null && 'id' in payload) {
    const { id } = payload;
    if (typeof id === 'string' || typeof id === 'number') return id;
  }
  return null;
}

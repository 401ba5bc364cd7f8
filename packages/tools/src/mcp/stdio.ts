import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { Logger } from '@n8nkit/logger';
import type { McpServer } from './server.js';

export interface StdioTransportOptions {
  input?: Readable;
  /** Protocol output only; logs go elsewhere */
  output?: Writable;
  logger?: Logger;
}

/**
 * Serve newline-delimited JSON-RPC over a pair of streams (stdin/stdout by
 * default). Messages are handled one at a time, in order. Resolves when the
 * input ends.
 */
export async function serveStdio(server: McpServer, options: StdioTransportOptions = {}): Promise<void> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const logger = options.logger?.child({ component: 'stdio_transport' });

  const lines = createInterface({ input, crlfDelay: Infinity });
  logger?.info('mcp_server_started', { server: server.name, version: server.version });

  try {
    for await (const line of lines) {
      if (line.trim() === '') continue;

      const response = await server.handleMessage(line);
      if (response) {
        output.write(`${JSON.stringify(response)}\n`);
      }
    }
  } finally {
    lines.close();
    logger?.info('mcp_server_stopped');
  }
}

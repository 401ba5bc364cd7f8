/**
 * n8nkit serve
 *
 * Runs the MCP server on stdio. stdout carries the protocol, so everything
 * else (logs, startup errors) goes to stderr.
 */

import { McpServer, createToolRegistry, serveStdio } from '@n8nkit/tools';
import { Command } from 'commander';
import { errorMessage, createRuntime } from '../runtime.js';
import type { ConnectionOptions } from './options.js';

export const serveCommand = new Command('serve')
  .description('Start the MCP server on stdio')
  .option('--api-url <url>', 'n8n base URL (default: N8N_BASE_URL or http://localhost:5678)')
  .option('--api-key <key>', 'n8n API key (default: N8N_API_KEY)')
  .action(async (options: ConnectionOptions) => {
    try {
      await runServe(options);
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(2);
    }
  });

async function runServe(options: ConnectionOptions): Promise<void> {
  const { config, logger, client } = createRuntime(options);
  const server = new McpServer({ registry: createToolRegistry({ client, logger }), logger });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info('mcp_server_signal', { signal });
    client.close();
    process.exit(0);
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  logger.info('n8n_target', { baseUrl: config.baseUrl });

  try {
    await serveStdio(server, { logger });
  } finally {
    client.close();
  }
}

/**
 * n8nkit CLI - MCP server and local tooling for n8n workflows
 */

import { Command } from 'commander';
import { checkCommand } from './commands/check.js';
import { healthCommand } from './commands/health.js';
import { serveCommand } from './commands/serve.js';

const program = new Command();

program
  .name('n8nkit')
  .description('MCP tools, workflow validation and health checks for n8n')
  .version('0.1.0');

// Register commands
program.addCommand(serveCommand);
program.addCommand(checkCommand);
program.addCommand(healthCommand);

await program.parseAsync();

/**
 * n8nkit health
 *
 * Fetches a workflow and its recent executions and prints a health report.
 */

import { DEFAULT_EXECUTION_LIMIT } from '@n8nkit/core';
import { isApiError } from '@n8nkit/sdk';
import { getWorkflowHealth } from '@n8nkit/tools';
import { Command } from 'commander';
import { formatHealthPretty } from '../reporter.js';
import { createRuntime, errorMessage } from '../runtime.js';
import { parseFormat, parsePositiveInt, type ConnectionOptions, type OutputFormat } from './options.js';

interface HealthOptions extends ConnectionOptions {
  limit: number;
  format: OutputFormat;
  color: boolean;
}

export const healthCommand = new Command('health')
  .description('Print a health report for a workflow')
  .argument('<workflowId>', 'ID of the workflow to analyze')
  .option('--limit <n>', 'Number of recent executions to analyze', parsePositiveInt, DEFAULT_EXECUTION_LIMIT)
  .option('--format <type>', 'Output format: pretty, json', parseFormat, 'pretty')
  .option('--no-color', 'Disable colored output')
  .option('--api-url <url>', 'n8n base URL (default: N8N_BASE_URL or http://localhost:5678)')
  .option('--api-key <key>', 'n8n API key (default: N8N_API_KEY)')
  .action(async (workflowId: string, options: HealthOptions) => {
    try {
      await runHealth(workflowId, options);
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(2);
    }
  });

async function runHealth(workflowId: string, options: HealthOptions): Promise<void> {
  const { client } = createRuntime(options);
  const result = await getWorkflowHealth(client, workflowId, options.limit);

  if (isApiError(result)) {
    console.error(`Error: ${result.error}${result.message ? ` - ${result.message}` : ''}`);
    process.exit(1);
  }

  if (options.format === 'json') {
    console.log(JSON.stringify(result, null, 2));
  } else {
    console.log(formatHealthPretty(result, options));
  }
}

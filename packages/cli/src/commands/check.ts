/**
 * n8nkit check
 *
 * Validates workflow JSON files locally, without contacting n8n.
 */

import { Command } from 'commander';
import { checkFile, collectFiles, hasFailures } from '../check.js';
import { formatCheckJson, formatCheckPretty } from '../reporter.js';
import { errorMessage } from '../runtime.js';
import { parseFormat, type OutputFormat } from './options.js';

interface CheckOptions {
  strict?: boolean;
  format: OutputFormat;
  quiet?: boolean;
  color: boolean;
}

export const checkCommand = new Command('check')
  .description('Check workflow JSON files for errors and warnings')
  .argument('[paths...]', 'Files or directories to check', ['.'])
  .option('--strict', 'Treat warnings as errors')
  .option('--format <type>', 'Output format: pretty, json', parseFormat, 'pretty')
  .option('--quiet', 'Only output on errors')
  .option('--no-color', 'Disable colored output')
  .action(async (paths: string[], options: CheckOptions) => {
    try {
      await runCheck(paths, options);
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(2);
    }
  });

async function runCheck(paths: string[], options: CheckOptions): Promise<void> {
  const { files, missing } = await collectFiles(paths);

  for (const p of missing) {
    console.error(`Path not found: ${p}`);
  }

  if (files.length === 0) {
    if (!options.quiet) {
      console.log('No files found to check');
    }
    process.exit(missing.length > 0 ? 2 : 0);
  }

  const results = files.map(checkFile);

  if (options.format === 'json') {
    console.log(formatCheckJson(results));
  } else {
    console.log(formatCheckPretty(results, options));
  }

  process.exit(hasFailures(results, options.strict) ? 1 : 0);
}

import * as fs from 'node:fs';
import * as path from 'node:path';
import { validateWorkflow } from '@n8nkit/core';
import { glob } from 'glob';
import { errorMessage } from './runtime.js';

export interface CheckResult {
  path: string;
  errors: string[];
  warnings: string[];
}

export interface CollectedFiles {
  files: string[];
  /** Arguments that matched nothing on disk */
  missing: string[];
}

/** Expand files and directories (searched for **\/*.json) into a sorted file list */
export async function collectFiles(paths: readonly string[]): Promise<CollectedFiles> {
  const files = new Set<string>();
  const missing: string[] = [];

  for (const p of paths) {
    const resolved = path.resolve(p);

    if (!fs.existsSync(resolved)) {
      missing.push(p);
      continue;
    }

    if (fs.statSync(resolved).isDirectory()) {
      const found = await glob('**/*.json', {
        cwd: resolved,
        absolute: true,
        nodir: true,
        ignore: ['**/node_modules/**', '**/dist/**'],
      });
      for (const file of found) files.add(file);
    } else {
      files.add(resolved);
    }
  }

  return { files: [...files].sort(), missing };
}

/** Validate one workflow file; unreadable or malformed files are reported as errors */
export function checkFile(filePath: string): CheckResult {
  let source: string;
  try {
    source = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    return { path: filePath, errors: [`Could not read file: ${errorMessage(error)}`], warnings: [] };
  }

  let workflow: unknown;
  try {
    workflow = JSON.parse(source);
  } catch (error) {
    return { path: filePath, errors: [`Invalid JSON: ${errorMessage(error)}`], warnings: [] };
  }

  const report = validateWorkflow(workflow);
  return { path: filePath, errors: [...report.errors], warnings: [...report.warnings] };
}

export function hasFailures(results: readonly CheckResult[], strict = false): boolean {
  return results.some(
    (result) => result.errors.length > 0 || (strict && result.warnings.length > 0),
  );
}

/**
 * Structural validation of workflow definitions before they are submitted to
 * n8n. Catches the mistakes the API would otherwise reject (or silently
 * accept and then fail on at run time).
 */

import type { ValidationReport } from '../types/reports.js';
import { describeType, isPlainObject } from '../utils.js';
import {
  checkConnections,
  checkForbiddenFields,
  checkNodes,
  checkRecommendedSettings,
  checkRequiredFields,
} from './checks.js';
import { ValidationResult } from './result.js';

export { classifyCredentialReference } from './credentials.js';
export { ValidationResult } from './result.js';

/**
 * Validate a workflow definition. Never throws and never mutates `workflow`.
 *
 * @example
 * ```typescript
 * const report = validateWorkflow(JSON.parse(source));
 * if (!report.valid) console.error(report.errors.join('\n'));
 * ```
 */
export function validateWorkflow(workflow: unknown): ValidationReport {
  const result = new ValidationResult();

  if (!isPlainObject(workflow)) {
    result.addError(`Workflow definition must be an object, got ${describeType(workflow)}.`);
    return result.toReport();
  }

  checkForbiddenFields(workflow, result);
  checkRequiredFields(workflow, result);
  checkNodes(workflow, result);
  checkConnections(workflow, result);
  checkRecommendedSettings(workflow, result);

  return result.toReport();
}

import { CLONE_FIELDS, DEFAULT_EXECUTION_ORDER, FORBIDDEN_FIELDS } from '../constants.js';
import { hasField, isPlainObject } from '../utils.js';

export interface PreparedClone {
  /** Body ready for workflow creation */
  workflow: Record<string, unknown>;
  /** Forbidden fields that were present on the source, sorted */
  fieldsRemoved: string[];
}

/**
 * Build a creatable copy of an existing workflow. Only the fields the create
 * endpoint accepts are carried over, deep-copied so the source is untouched.
 */
export function prepareClone(source: Record<string, unknown>, newName: string): PreparedClone {
  const workflow: Record<string, unknown> = {};

  for (const field of CLONE_FIELDS) {
    if (hasField(source, field)) {
      workflow[field] = structuredClone(source[field]);
    }
  }

  workflow.name = newName;

  const settings = workflow.settings;
  if (!isPlainObject(settings)) {
    workflow.settings = { executionOrder: DEFAULT_EXECUTION_ORDER };
  } else if (!hasField(settings, 'executionOrder')) {
    workflow.settings = { ...settings, executionOrder: DEFAULT_EXECUTION_ORDER };
  }

  const fieldsRemoved = FORBIDDEN_FIELDS.filter((field) => hasField(source, field)).sort();

  return { workflow, fieldsRemoved };
}

import { FORBIDDEN_FIELDS, REQUIRED_NODE_FIELDS, REQUIRED_WORKFLOW_FIELDS } from '../constants.js';
import { describeType, hasField, isPlainObject } from '../utils.js';
import { classifyCredentialReference } from './credentials.js';
import type { ValidationResult } from './result.js';

type WorkflowRecord = Record<string, unknown>;

export function checkForbiddenFields(workflow: WorkflowRecord, result: ValidationResult): void {
  for (const field of FORBIDDEN_FIELDS) {
    if (hasField(workflow, field)) {
      result.addError(
        `Forbidden field '${field}' present. Remove it to avoid 'must NOT have additional properties' error.`,
      );
    }
  }
}

export function checkRequiredFields(workflow: WorkflowRecord, result: ValidationResult): void {
  for (const field of REQUIRED_WORKFLOW_FIELDS) {
    if (!hasField(workflow, field)) {
      result.addError(`Required field '${field}' is missing.`);
    }
  }
}

export function checkNodes(workflow: WorkflowRecord, result: ValidationResult): void {
  const nodes = workflow.nodes;
  if (nodes === undefined || nodes === null) return;

  if (!Array.isArray(nodes)) {
    result.addError("Field 'nodes' must be an array.");
    return;
  }

  if (nodes.length === 0) {
    result.addWarning('Workflow has no nodes. Consider adding at least a trigger node.');
    return;
  }

  const seenIds = new Set<unknown>();

  nodes.forEach((node: unknown, index) => {
    if (!isPlainObject(node)) {
      result.addError(`Node at index ${index} must be an object, got ${describeType(node)}.`);
      return;
    }

    const label = hasField(node, 'name') ? String(node.name) : `index ${index}`;

    for (const field of REQUIRED_NODE_FIELDS) {
      if (!hasField(node, field)) {
        result.addError(`Node '${label}' missing required field '${field}'.`);
      }
    }

    const id = node.id;
    // Only primitive ids are tracked
    if (id && typeof id !== 'object') {
      if (seenIds.has(id)) {
        result.addError(`Duplicate node ID '${String(id)}' found.`);
      }
      seenIds.add(id);
    }

    const position = node.position;
    if (position !== undefined && position !== null) {
      if (!Array.isArray(position) || position.length !== 2) {
        result.addError(`Node '${label}' position must be [x, y] array.`);
      }
    }

    checkNodeCredentials(node.credentials, label, result);
  });
}

function checkNodeCredentials(credentials: unknown, label: string, result: ValidationResult): void {
  if (credentials === undefined || credentials === null) return;

  if (!isPlainObject(credentials)) {
    result.addError(`Node '${label}' credentials must be an object.`);
    return;
  }

  for (const raw of Object.values(credentials)) {
    const reference = classifyCredentialReference(raw);
    if (reference?.kind === 'name') {
      result.addWarning(
        `Node '${label}' references credential '${reference.name}' by name. Use 'id' for reliability.`,
      );
    }
  }
}

export function checkConnections(workflow: WorkflowRecord, result: ValidationResult): void {
  const connections = workflow.connections;
  if (connections === undefined || connections === null) return;

  if (!isPlainObject(connections)) {
    result.addError("Field 'connections' must be an object.");
    return;
  }

  const nodeNames = new Set<unknown>();
  if (Array.isArray(workflow.nodes)) {
    for (const node of workflow.nodes) {
      if (isPlainObject(node)) nodeNames.add(node.name);
    }
  }

  for (const source of Object.keys(connections)) {
    if (!nodeNames.has(source)) {
      result.addError(`Connection source '${source}' does not match any node name.`);
    }
  }
}

export function checkRecommendedSettings(workflow: WorkflowRecord, result: ValidationResult): void {
  const settings = workflow.settings;

  if (settings === undefined || settings === null) {
    result.addWarning(
      `Missing 'settings' field. Recommend adding: {"settings": {"executionOrder": "v1"}}`,
    );
    return;
  }

  if (isPlainObject(settings) && !hasField(settings, 'executionOrder')) {
    result.addWarning(`Missing 'executionOrder' in settings. Recommend: {"executionOrder": "v1"}`);
  }
}

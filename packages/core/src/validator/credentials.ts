import type { CredentialReference } from '../types/workflow.js';
import { hasField, isPlainObject } from '../utils.js';

/**
 * Classify a raw `credentials` entry by the keys it carries. Any `id` key
 * makes it a by-id reference, whatever its value; a `name` key without one
 * is by name. Anything else yields `undefined`.
 */
export function classifyCredentialReference(raw: unknown): CredentialReference | undefined {
  if (!isPlainObject(raw)) return undefined;

  if (hasField(raw, 'id')) {
    return typeof raw.name === 'string' ? { kind: 'id', id: raw.id, name: raw.name } : { kind: 'id', id: raw.id };
  }
  if (hasField(raw, 'name')) {
    return { kind: 'name', name: String(raw.name) };
  }
  return undefined;
}

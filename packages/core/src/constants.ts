/**
 * Top-level fields the n8n API rejects on create/update with
 * "must NOT have additional properties". Kept sorted.
 */
export const FORBIDDEN_FIELDS = [
  'active',
  'createdAt',
  'description',
  'id',
  'meta',
  'pinData',
  'staticData',
  'triggerCount',
  'updatedAt',
  'versionCounter',
  'versionId',
] as const;

export type ForbiddenField = (typeof FORBIDDEN_FIELDS)[number];

export const REQUIRED_WORKFLOW_FIELDS = ['connections', 'name', 'nodes'] as const;

export const REQUIRED_NODE_FIELDS = ['id', 'name', 'position', 'type', 'typeVersion'] as const;

/** The only fields carried over when cloning */
export const CLONE_FIELDS = ['name', 'nodes', 'connections', 'settings'] as const;

export const DEFAULT_EXECUTION_ORDER = 'v1';

export const DEFAULT_EXECUTION_LIMIT = 20;

/** Success rate (percent) above which a workflow is healthy */
export const HEALTHY_THRESHOLD = 95;

/** Lowest success rate (percent) still considered degraded */
export const DEGRADED_THRESHOLD = 80;

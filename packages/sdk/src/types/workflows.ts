import type { Tag } from './tags.js';

export interface WorkflowNode {
  id: string;
  name: string;
  type: string;
  typeVersion: number;
  position: [number, number];
  parameters?: Record<string, unknown>;
  credentials?: Record<string, { id?: string; name?: string }>;
  [key: string]: unknown;
}

export interface WorkflowSettings {
  executionOrder?: string;
  saveExecutionProgress?: boolean;
  saveManualExecutions?: boolean;
  saveDataErrorExecution?: string;
  saveDataSuccessExecution?: string;
  executionTimeout?: number;
  [key: string]: unknown;
}

/** Workflow as returned by the n8n API, read-only fields included */
export interface Workflow {
  id: string;
  name: string;
  active: boolean;
  nodes: WorkflowNode[];
  connections: Record<string, unknown>;
  settings?: WorkflowSettings;
  staticData?: Record<string, unknown> | null;
  tags?: Tag[];
  createdAt?: string;
  updatedAt?: string;
  versionId?: string;
  [key: string]: unknown;
}

export interface WorkflowList {
  data: Workflow[];
  nextCursor?: string | null;
}

/** Body accepted by create/update. Read-only fields are rejected by the API. */
export type WorkflowInput = Record<string, unknown>;

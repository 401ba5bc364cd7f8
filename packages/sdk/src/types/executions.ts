export type ExecutionStatus =
  | 'canceled'
  | 'crashed'
  | 'error'
  | 'new'
  | 'running'
  | 'success'
  | 'unknown'
  | 'waiting';

export interface Execution {
  id: string | number;
  workflowId?: string;
  mode?: string;
  /** Free-form upstream; not limited to ExecutionStatus */
  status?: ExecutionStatus | (string & {});
  finished?: boolean;
  startedAt?: string | null;
  stoppedAt?: string | null;
  retryOf?: string | null;
  retrySuccessId?: string | null;
  data?: Record<string, unknown>;
  [key: string]: unknown;
}

export interface ExecutionList {
  data: Execution[];
  nextCursor?: string | null;
}

export interface ExecutionListQuery {
  workflowId?: string;
  limit?: number;
}

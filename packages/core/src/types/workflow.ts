/**
 * Workflow definition as submitted to the n8n API.
 *
 * Validation takes `unknown`; these types describe what a valid
 * definition looks like once it passes.
 */
export interface WorkflowDefinition {
  name: string;
  nodes: NodeDefinition[];
  connections: Record<string, Connections>;
  settings?: WorkflowSettings;
}

export interface NodeDefinition {
  id: string;
  /** Connections address nodes by name, not id */
  name: string;
  type: string;
  typeVersion: number;
  position: [number, number];
  parameters?: Record<string, unknown>;
  credentials?: Record<string, RawCredentialReference>;
}

export interface RawCredentialReference {
  id?: string;
  name?: string;
}

/**
 * How a node points at a stored credential. References by name are
 * ambiguous when two credentials share a name.
 */
export type CredentialReference =
  | { kind: 'id'; id: unknown; name?: string }
  | { kind: 'name'; name: string };

/** Output type (e.g. `main`) to per-output lists of targets */
export type Connections = Record<string, ConnectionTarget[][]>;

export interface ConnectionTarget {
  node: string;
  type: string;
  index: number;
}

export interface WorkflowSettings {
  executionOrder?: string;
  [key: string]: unknown;
}

/** The parts of a stored workflow the health analyzer reads */
export interface WorkflowSummary {
  id?: string | number;
  name?: string;
  active?: boolean | null;
}

/** One historical run, as listed by the executions endpoint */
export interface ExecutionRecord {
  id?: string | number;
  status?: string | null;
  finished?: boolean | null;
  startedAt?: string | null;
  stoppedAt?: string | null;
}

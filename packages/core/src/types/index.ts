export type { HealthReport, HealthStatus, ValidationReport } from './reports.js';
export type {
  ConnectionTarget,
  Connections,
  CredentialReference,
  ExecutionRecord,
  NodeDefinition,
  RawCredentialReference,
  WorkflowDefinition,
  WorkflowSettings,
  WorkflowSummary,
} from './workflow.js';

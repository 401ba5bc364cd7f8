import type { HealthReport } from '../types/reports.js';
import type { ExecutionRecord, WorkflowSummary } from '../types/workflow.js';
import { roundTo } from '../utils.js';
import { classifyHealth, countExecutions, successRate } from './classify.js';
import { averageDurationSeconds } from './durations.js';

export interface AnalyzeHealthOptions {
  /** Reported id; defaults to the workflow's own id */
  workflowId?: string;
}

/**
 * Score a workflow from its recent execution history.
 *
 * Issues and recommendations are appended in a fixed order: the rate
 * classification first, then in-flight runs, then inactivity.
 */
export function analyzeHealth(
  workflow: WorkflowSummary,
  executions: readonly ExecutionRecord[],
  options: AnalyzeHealthOptions = {},
): HealthReport {
  const workflowId = options.workflowId ?? (workflow.id === undefined ? '' : String(workflow.id));
  const workflowName = workflow.name ?? 'Unknown';

  if (executions.length === 0) {
    return {
      workflow_id: workflowId,
      workflow_name: workflowName,
      health_status: 'unknown',
      success_rate: null,
      total_executions: 0,
      successful_executions: 0,
      failed_executions: 0,
      avg_duration_seconds: null,
      issues: ['No execution history available'],
      recommendations: ['Execute the workflow to establish baseline metrics'],
    };
  }

  const counts = countExecutions(executions);
  const rate = successRate(counts);
  const status = classifyHealth(rate, counts.completed);

  const issues: string[] = [];
  const recommendations: string[] = [];

  switch (status) {
    case 'unknown':
      issues.push('No completed executions to analyze');
      break;
    case 'degraded':
      issues.push(`${counts.failed} failed executions in recent history`);
      recommendations.push('Review failed execution logs to identify root cause');
      break;
    case 'unhealthy':
      issues.push(`High failure rate: ${counts.failed} of ${counts.completed} executions failed`);
      recommendations.push(
        'Investigate workflow configuration and external dependencies',
        'Consider disabling workflow until issues are resolved',
      );
      break;
    case 'healthy':
      break;
  }

  if (counts.running > 0) {
    issues.push(`${counts.running} executions currently running or in unknown state`);
  }

  if (!workflow.active) {
    issues.push('Workflow is currently inactive');
    recommendations.push('Activate workflow if it should be running');
  }

  return {
    workflow_id: workflowId,
    workflow_name: workflowName,
    health_status: status,
    success_rate: roundTo(rate, 1),
    total_executions: counts.total,
    successful_executions: counts.successful,
    failed_executions: counts.failed,
    avg_duration_seconds: averageDurationSeconds(executions),
    issues,
    recommendations,
  };
}

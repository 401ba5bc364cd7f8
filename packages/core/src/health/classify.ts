import { DEGRADED_THRESHOLD, HEALTHY_THRESHOLD } from '../constants.js';
import type { HealthStatus } from '../types/reports.js';
import type { ExecutionRecord } from '../types/workflow.js';

export function isFailedExecution(execution: ExecutionRecord): boolean {
  return execution.status === 'error' || (Boolean(execution.stoppedAt) && !execution.finished);
}

export function isSuccessfulExecution(execution: ExecutionRecord): boolean {
  return Boolean(execution.finished) && execution.status !== 'error';
}

export interface ExecutionCounts {
  total: number;
  successful: number;
  failed: number;
  /** Neither successful nor failed: still running or in an unknown state */
  running: number;
  completed: number;
}

export function countExecutions(executions: readonly ExecutionRecord[]): ExecutionCounts {
  const total = executions.length;
  const successful = executions.filter(isSuccessfulExecution).length;
  const failed = executions.filter(isFailedExecution).length;
  return {
    total,
    successful,
    failed,
    running: total - successful - failed,
    completed: successful + failed,
  };
}

/**
 * Success rate in percent over completed runs. With nothing completed the
 * rate is 100 when every run is still in flight, otherwise 0.
 */
export function successRate(counts: ExecutionCounts): number {
  if (counts.completed > 0) {
    return (counts.successful / counts.completed) * 100;
  }
  return counts.running === counts.total ? 100 : 0;
}

export function classifyHealth(rate: number, completed: number): HealthStatus {
  if (completed === 0) return 'unknown';
  if (rate > HEALTHY_THRESHOLD) return 'healthy';
  if (rate >= DEGRADED_THRESHOLD) return 'degraded';
  return 'unhealthy';
}

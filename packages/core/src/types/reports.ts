export interface ValidationReport {
  valid: boolean;
  errors: readonly string[];
  warnings: readonly string[];
  error_count: number;
  warning_count: number;
}

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy' | 'unknown';

export interface HealthReport {
  workflow_id: string;
  workflow_name: string;
  health_status: HealthStatus;
  /** Percent of completed executions that succeeded; null without history */
  success_rate: number | null;
  total_executions: number;
  successful_executions: number;
  failed_executions: number;
  avg_duration_seconds: number | null;
  issues: string[];
  recommendations: string[];
}

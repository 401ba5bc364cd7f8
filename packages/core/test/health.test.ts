import { describe, expect, it } from 'vitest';
import {
  analyzeHealth,
  averageDurationSeconds,
  classifyHealth,
  countExecutions,
  executionDurationSeconds,
  successRate,
  type ExecutionRecord,
} from '../src/index.js';
import { failed, running, succeeded, times } from './fixtures.js';

const ACTIVE_WORKFLOW = { id: 'wf-1', name: 'Order Sync', active: true };

describe('classifyHealth', () => {
  it.each([
    [100, 10, 'healthy'],
    [95.1, 10, 'healthy'],
    [95, 10, 'degraded'],
    [80, 10, 'degraded'],
    [79.999, 10, 'unhealthy'],
    [0, 10, 'unhealthy'],
    [100, 0, 'unknown'],
  ] as const)('rate %d over %d completed is %s', (rate, completed, status) => {
    expect(classifyHealth(rate, completed)).toBe(status);
  });
});

describe('countExecutions', () => {
  it('applies the failure and success predicates independently', () => {
    const counts = countExecutions([
      { finished: true, status: 'error' },
      { finished: false, status: 'running' },
      { finished: true, status: 'success' },
      { finished: false, stoppedAt: '2024-01-01T10:00:00.000Z' },
    ]);

    expect(counts).toEqual({ total: 4, successful: 1, failed: 2, running: 1, completed: 3 });
  });
});

describe('successRate', () => {
  it('is 100 when every run is still in flight', () => {
    expect(successRate({ total: 2, successful: 0, failed: 0, running: 2, completed: 0 })).toBe(100);
  });

  it('is 0 without completed runs otherwise', () => {
    expect(successRate({ total: 2, successful: 0, failed: 0, running: 1, completed: 0 })).toBe(0);
  });
});

describe('durations', () => {
  it('measures finished runs in seconds', () => {
    expect(executionDurationSeconds(succeeded(3))).toBe(3);
    expect(
      executionDurationSeconds({ startedAt: '2024-01-01T10:00:00Z', stoppedAt: '2024-01-01T10:00:01.500Z' }),
    ).toBe(1.5);
  });

  it.each<[string, ExecutionRecord]>([
    ['no stop time', { startedAt: '2024-01-01T10:00:00Z', stoppedAt: null }],
    ['no start time', { stoppedAt: '2024-01-01T10:00:00Z' }],
    ['unparseable', { startedAt: 'yesterday', stoppedAt: '2024-01-01T10:00:00Z' }],
    ['negative', { startedAt: '2024-01-01T10:00:05Z', stoppedAt: '2024-01-01T10:00:00Z' }],
  ])('skips runs with %s', (_label, execution) => {
    expect(executionDurationSeconds(execution)).toBeUndefined();
  });

  it('averages to two decimals over measurable runs only', () => {
    const average = averageDurationSeconds([
      succeeded(1),
      succeeded(2),
      succeeded(2),
      running(),
      { startedAt: 'not-a-date', stoppedAt: '2024-01-01T10:00:00Z' },
    ]);

    expect(average).toBe(1.67);
  });

  it('rounds exact ties to the even neighbour', () => {
    const execution = { startedAt: '2024-01-01T10:00:00.000Z', stoppedAt: '2024-01-01T10:00:01.125Z' };

    expect(averageDurationSeconds([execution])).toBe(1.12);
  });

  it('is null when nothing is measurable', () => {
    expect(averageDurationSeconds([running()])).toBeNull();
  });
});

describe('analyzeHealth', () => {
  it('reports unknown health without history', () => {
    expect(analyzeHealth(ACTIVE_WORKFLOW, [])).toEqual({
      workflow_id: 'wf-1',
      workflow_name: 'Order Sync',
      health_status: 'unknown',
      success_rate: null,
      total_executions: 0,
      successful_executions: 0,
      failed_executions: 0,
      avg_duration_seconds: null,
      issues: ['No execution history available'],
      recommendations: ['Execute the workflow to establish baseline metrics'],
    });
  });

  it('reports a healthy workflow', () => {
    const report = analyzeHealth(ACTIVE_WORKFLOW, times(10, () => succeeded(2)));

    expect(report).toEqual({
      workflow_id: 'wf-1',
      workflow_name: 'Order Sync',
      health_status: 'healthy',
      success_rate: 100,
      total_executions: 10,
      successful_executions: 10,
      failed_executions: 0,
      avg_duration_seconds: 2,
      issues: [],
      recommendations: [],
    });
  });

  it('reports a degraded workflow', () => {
    const report = analyzeHealth(ACTIVE_WORKFLOW, [...times(9, succeeded), failed()]);

    expect(report.health_status).toBe('degraded');
    expect(report.success_rate).toBe(90);
    expect(report.issues).toEqual(['1 failed executions in recent history']);
    expect(report.recommendations).toEqual(['Review failed execution logs to identify root cause']);
  });

  it('reports an unhealthy workflow', () => {
    const report = analyzeHealth(ACTIVE_WORKFLOW, [...times(3, succeeded), failed(), failed()]);

    expect(report.health_status).toBe('unhealthy');
    expect(report.success_rate).toBe(60);
    expect(report.failed_executions).toBe(2);
    expect(report.issues).toEqual(['High failure rate: 2 of 5 executions failed']);
    expect(report.recommendations).toEqual([
      'Investigate workflow configuration and external dependencies',
      'Consider disabling workflow until issues are resolved',
    ]);
  });

  it('reports unknown health when nothing has completed', () => {
    const report = analyzeHealth(ACTIVE_WORKFLOW, [running(), running()]);

    expect(report.health_status).toBe('unknown');
    expect(report.success_rate).toBe(100);
    expect(report.issues).toEqual([
      'No completed executions to analyze',
      '2 executions currently running or in unknown state',
    ]);
    expect(report.recommendations).toEqual([]);
    expect(report.avg_duration_seconds).toBeNull();
  });

  it('counts an errored run that finished as failed only', () => {
    const report = analyzeHealth(ACTIVE_WORKFLOW, [
      succeeded(),
      { finished: true, status: 'error' },
      { finished: false, status: 'running' },
    ]);

    expect(report.successful_executions).toBe(1);
    expect(report.failed_executions).toBe(1);
    expect(report.success_rate).toBe(50);
    expect(report.issues).toEqual([
      'High failure rate: 1 of 2 executions failed',
      '1 executions currently running or in unknown state',
    ]);
  });

  it('scores 17 of 20 successful runs as degraded', () => {
    const report = analyzeHealth(ACTIVE_WORKFLOW, [...times(17, succeeded), ...times(3, failed)]);

    expect(report.success_rate).toBe(85);
    expect(report.health_status).toBe('degraded');
    expect(report.failed_executions).toBe(3);
    expect(report.issues).toEqual(['3 failed executions in recent history']);
  });

  it('averages the durations of successful runs', () => {
    const report = analyzeHealth(ACTIVE_WORKFLOW, [succeeded(1), succeeded(2), succeeded(4)]);

    expect(report.health_status).toBe('healthy');
    expect(report.success_rate).toBe(100);
    expect(report.avg_duration_seconds).toBe(2.33);
  });

  it('flags inactive workflows', () => {
    const report = analyzeHealth({ ...ACTIVE_WORKFLOW, active: false }, [succeeded()]);

    expect(report.health_status).toBe('healthy');
    expect(report.issues).toEqual(['Workflow is currently inactive']);
    expect(report.recommendations).toEqual(['Activate workflow if it should be running']);
  });

  it('rounds the success rate to one decimal', () => {
    const report = analyzeHealth(ACTIVE_WORKFLOW, [succeeded(), succeeded(), failed()]);

    expect(report.success_rate).toBe(66.7);
    expect(report.health_status).toBe('unhealthy');
  });

  it('rounds an exact tie in the success rate to the even neighbour', () => {
    const report = analyzeHealth(ACTIVE_WORKFLOW, [...times(49, succeeded), ...times(351, failed)]);

    expect(report.success_rate).toBe(12.2);
  });

  it('takes the reported id from options, then the workflow', () => {
    expect(analyzeHealth(ACTIVE_WORKFLOW, [], { workflowId: 'override' }).workflow_id).toBe('override');
    expect(analyzeHealth({ id: 42, name: 'Numbered' }, []).workflow_id).toBe('42');
    expect(analyzeHealth({}, []).workflow_id).toBe('');
  });

  it('names unnamed workflows Unknown', () => {
    expect(analyzeHealth({ id: 'wf-2' }, []).workflow_name).toBe('Unknown');
  });

  it('never lowers the success rate when a success is added', () => {
    const history = [...times(4, succeeded), failed()];
    const before = analyzeHealth(ACTIVE_WORKFLOW, history).success_rate ?? 0;
    const after = analyzeHealth(ACTIVE_WORKFLOW, [...history, succeeded()]).success_rate ?? 0;

    expect(after).toBeGreaterThanOrEqual(before);
  });
});

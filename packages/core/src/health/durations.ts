import { differenceInMilliseconds, isValid, parseISO } from 'date-fns';
import type { ExecutionRecord } from '../types/workflow.js';
import { roundTo } from '../utils.js';

/** Wall-clock duration of a finished run, or undefined when it can't be measured */
export function executionDurationSeconds(execution: ExecutionRecord): number | undefined {
  const { startedAt, stoppedAt } = execution;
  if (typeof startedAt !== 'string' || typeof stoppedAt !== 'string') return undefined;
  if (!startedAt || !stoppedAt) return undefined;

  const started = parseISO(startedAt);
  const stopped = parseISO(stoppedAt);
  if (!isValid(started) || !isValid(stopped)) return undefined;

  const seconds = differenceInMilliseconds(stopped, started) / 1000;
  return seconds >= 0 ? seconds : undefined;
}

/** Mean duration in seconds, two decimals; null when no run could be measured */
export function averageDurationSeconds(executions: readonly ExecutionRecord[]): number | null {
  const durations: number[] = [];
  for (const execution of executions) {
    const seconds = executionDurationSeconds(execution);
    if (seconds !== undefined) durations.push(seconds);
  }

  if (durations.length === 0) return null;

  const total = durations.reduce((sum, seconds) => sum + seconds, 0);
  return roundTo(total / durations.length, 2);
}

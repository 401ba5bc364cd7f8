export { analyzeHealth, type AnalyzeHealthOptions } from './analyzer.js';
export {
  classifyHealth,
  countExecutions,
  isFailedExecution,
  isSuccessfulExecution,
  successRate,
  type ExecutionCounts,
} from './classify.js';
export { averageDurationSeconds, executionDurationSeconds } from './durations.js';

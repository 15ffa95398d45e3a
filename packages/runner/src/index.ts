export { evaluateModule, evaluateExample, summarizeResults, runFingerprint, runSignal, moduleIdentity } from './engine.js';
export { compareRuns, rankRuns, verdictFor } from './compare.js';
export { invokeWithRetry, backoffDelay } from './invoke.js';
export type { InvokeOptions, InvokeOutcome } from './invoke.js';
export { mapWithConcurrency } from './pool.js';
export { summarize, welchTTest, cohensD, normalCdf, tValue95 } from './statistics.js';
export type { WelchResult } from './statistics.js';

export type {
  FailureKind,
  ExampleFailure,
  IssueCounts,
  ExampleResult,
  StatisticalSummary,
  MetricSummaries,
  EvaluationRun,
  ProgressEvent,
  EvaluateOptions,
  Verdict,
  MetricDelta,
  SignificanceTest,
  ComparisonReport,
  CompareOptions,
  RankedRun,
} from './types.js';

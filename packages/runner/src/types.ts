import type { Logger, MetricName, QualityScore, RunConfig, RunConfigInput } from '@skillbench/core';

export type FailureKind = 'invocation' | 'timeout' | 'extraction';

export interface ExampleFailure {
  kind: FailureKind;
  message: string;
}

export interface IssueCounts {
  predicted: number;
  expected: number;
  matched: number;
}

export interface ExampleResult {
  exampleId: string;
  status: 'ok' | 'failed';
  failure?: ExampleFailure;
  attempts: number;
  durationMs: number;
  output?: string;
  counts?: IssueCounts;
  score: QualityScore;
}

export interface StatisticalSummary {
  n: number;
  mean: number;
  median: number;
  variance: number;
  stdDev: number;
  min: number;
  max: number;
  confidenceInterval: [number, number];
}

export type MetricSummaries = Record<MetricName, StatisticalSummary>;

/** Immutable record of one module evaluated over one corpus under one config. */
export interface EvaluationRun {
  module: string;
  fingerprint: string;
  corpusFingerprint: string;
  config: RunConfig;
  results: readonly ExampleResult[];
  summary: MetricSummaries;
  total: number;
  succeeded: number;
  failed: number;
  failureRate: number;
  durationMs: number;
}

export interface ProgressEvent {
  completed: number;
  total: number;
  result: ExampleResult;
}

export interface EvaluateOptions {
  config?: RunConfigInput;
  logger?: Logger;
  /** Aborts the whole run; in-flight examples are recorded as timed out. */
  signal?: AbortSignal;
  onProgress?: (event: ProgressEvent) => void;
  random?: () => number;
}

export type Verdict = 'improved' | 'regressed' | 'no_significant_change';

export interface MetricDelta {
  baseline: number;
  candidate: number;
  delta: number;
  /** delta / baseline; null when the baseline mean is 0. */
  relativeDelta: number | null;
}

export interface SignificanceTest {
  tStatistic: number;
  degreesOfFreedom: number;
  pValue: number;
  effectSize: number;
}

export interface ComparisonReport {
  baseline: { module: string; fingerprint: string; failureRate: number };
  candidate: { module: string; fingerprint: string; failureRate: number };
  metrics: Record<MetricName, MetricDelta>;
  verdict: Verdict;
  noiseThreshold: number;
  significance: SignificanceTest;
  fingerprint: string;
}

export interface CompareOptions {
  noiseThreshold?: number;
}

export interface RankedRun {
  rank: number;
  module: string;
  fingerprint: string;
  overall: number;
  failureRate: number;
}

import type { Logger, ModelInvoker, RunConfigInput, TrainingExample } from '@skillbench/core';
import type { BootstrapResult, Metric } from '@skillbench/bootstrap';
import type { ComparisonReport, EvaluationRun } from '@skillbench/runner';

export type StageName = 'split' | 'baseline' | 'bootstrap' | 'candidate' | 'compare';

export interface OptimizeInput {
  name: string;
  skill: string;
  invoke: ModelInvoker;
  /** Corpus file path or loaded examples; split by `trainRatio` (and `seed`). */
  corpus?: string | readonly TrainingExample[];
  /** Explicit sets, used instead of `corpus` when both are given. */
  trainset?: readonly TrainingExample[];
  valset?: readonly TrainingExample[];
  config?: RunConfigInput;
  metric?: Metric;
  logger?: Logger;
  signal?: AbortSignal;
  random?: () => number;
}

export interface StageResult {
  stage: number;
  name: StageName;
  duration_ms: number;
}

export interface OptimizationResult {
  trainset: readonly string[];
  valset: readonly string[];
  baseline: EvaluationRun;
  bootstrap: BootstrapResult;
  candidate: EvaluationRun;
  comparison: ComparisonReport;
  optimizedSkill: string;
  stages: StageResult[];
  duration_ms: number;
}

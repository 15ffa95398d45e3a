import type {
  Demonstration,
  Logger,
  ModelInvoker,
  QualityScore,
  RunConfig,
  RunConfigInput,
  TrainingExample,
} from '@skillbench/core';
import type { FailureKind } from '@skillbench/runner';

export type Metric = (output: string, example: TrainingExample, config: RunConfig) => QualityScore;

export interface BootstrapOptions {
  config?: RunConfigInput;
  metric?: Metric;
  logger?: Logger;
  signal?: AbortSignal;
  random?: () => number;
}

export interface BootstrapCandidate {
  exampleId: string;
  index: number;
  output: string;
  score: QualityScore;
  accepted: boolean;
}

export interface BootstrapFailure {
  exampleId: string;
  kind: FailureKind;
  message: string;
}

export interface BootstrapResult {
  demonstrations: readonly Demonstration[];
  candidates: readonly BootstrapCandidate[];
  failures: readonly BootstrapFailure[];
  fingerprint: string;
}

export interface PromptModuleInput {
  name: string;
  skill: string;
  invoke: ModelInvoker;
  demonstrations?: readonly Demonstration[];
}

export interface CorpusSplit {
  trainset: readonly TrainingExample[];
  valset: readonly TrainingExample[];
}

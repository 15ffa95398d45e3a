// --- Severity ---

export type Severity = 'critical' | 'high' | 'medium' | 'low';

export const SEVERITIES = ['critical', 'high', 'medium', 'low'] as const satisfies readonly Severity[];

export const SEVERITY_ORDER: Record<Severity, number> = {
  critical: 4,
  high: 3,
  medium: 2,
  low: 1,
};

/** Placeholder for a field the extractor saw evidence of but could not recover. */
export const UNKNOWN = 'unknown' as const;
export type Unknown = typeof UNKNOWN;

// --- Issues ---

export interface ExpectedIssue {
  readonly title: string;
  readonly severity: Severity;
  readonly locations: readonly string[]; // e.g. "authenticate_user:12"
  readonly fix: string;
  readonly description?: string;
  readonly category?: string;
}

export interface PredictedIssue {
  title: string;
  severity: Severity | Unknown;
  locations: string[];
  description: string;
  fix?: string;
  impact?: string;
}

// --- Corpus ---

export interface ExampleInput {
  readonly code: string;
  readonly language: string;
}

export interface TrainingExample extends ExampleInput {
  readonly id: string;
  readonly description?: string;
  readonly expectedIssues: readonly ExpectedIssue[];
}

// --- Matching ---

export interface MatchedPair {
  predicted: PredictedIssue;
  expected: ExpectedIssue;
  predictedIndex: number;
  expectedIndex: number;
  similarity: number;
  severityMatch: boolean;
}

export interface UnmatchedIssue<T> {
  issue: T;
  index: number;
}

export interface MatchResult {
  matched: MatchedPair[];
  falsePositives: UnmatchedIssue<PredictedIssue>[];
  falseNegatives: UnmatchedIssue<ExpectedIssue>[];
  predictedCount: number;
  expectedCount: number;
}

// --- Scoring ---

export const METRIC_NAMES = [
  'precision',
  'recall',
  'f1',
  'criticalRecall',
  'severityAccuracy',
  'fixQuality',
  'falsePositiveRate',
  'overall',
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

export type WeightedMetric = 'precision' | 'recall' | 'f1' | 'criticalRecall' | 'severityAccuracy' | 'fixQuality';

export type ScoreWeights = Record<WeightedMetric, number>;

export interface QualityScore {
  precision: number;
  /** null when nothing was expected but something was predicted. */
  recall: number | null;
  f1: number;
  criticalRecall: number;
  severityAccuracy: number;
  fixQuality: number;
  falsePositiveRate: number;
  overall: number;
  failed: boolean;
}

// --- Modules & demonstrations ---

export type ModelInvoker = (prompt: string, input: ExampleInput, signal: AbortSignal) => Promise<string>;

export interface PromptModule {
  readonly name: string;
  readonly fingerprint?: string;
  run(example: TrainingExample, signal: AbortSignal): Promise<string>;
}

export type DemonstrationSource = 'bootstrapped' | 'labeled';

export interface Demonstration {
  readonly example: TrainingExample;
  readonly output: string;
  readonly score: QualityScore | null;
  readonly source: DemonstrationSource;
}

// --- Configuration ---

export interface SimilarityWeights {
  text: number;
  location: number;
}

export interface RunConfig {
  similarityThreshold: number;
  similarityWeights: SimilarityWeights;
  scoreWeights: ScoreWeights;
  metricThreshold: number;
  maxBootstrappedDemos: number;
  maxLabeledDemos: number;
  concurrency: number;
  callTimeoutMs: number;
  runTimeoutMs?: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  noiseThreshold: number;
  seed?: number;
  trainRatio: number;
}

export const DEFAULT_SIMILARITY_THRESHOLD = 0.5;
export const DEFAULT_SIMILARITY_WEIGHTS: SimilarityWeights = { text: 0.7, location: 0.3 };
export const DEFAULT_SCORE_WEIGHTS: ScoreWeights = {
  precision: 0,
  recall: 0,
  f1: 0.4,
  criticalRecall: 0.3,
  severityAccuracy: 0,
  fixQuality: 0.3,
};
export const DEFAULT_METRIC_THRESHOLD = 0.5;
export const DEFAULT_MAX_BOOTSTRAPPED_DEMOS = 4;
export const DEFAULT_MAX_LABELED_DEMOS = 8;
export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_CALL_TIMEOUT = 30_000;
export const DEFAULT_MAX_RETRIES = 2;
export const DEFAULT_RETRY_BASE_DELAY = 1_000;
export const DEFAULT_NOISE_THRESHOLD = 0.01;
export const DEFAULT_TRAIN_RATIO = 0.8;

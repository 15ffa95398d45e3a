import { z } from 'zod';
import {
  SEVERITIES,
  DEFAULT_SIMILARITY_THRESHOLD,
  DEFAULT_SIMILARITY_WEIGHTS,
  DEFAULT_SCORE_WEIGHTS,
  DEFAULT_METRIC_THRESHOLD,
  DEFAULT_MAX_BOOTSTRAPPED_DEMOS,
  DEFAULT_MAX_LABELED_DEMOS,
  DEFAULT_CONCURRENCY,
  DEFAULT_CALL_TIMEOUT,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_BASE_DELAY,
  DEFAULT_NOISE_THRESHOLD,
  DEFAULT_TRAIN_RATIO,
} from './types.js';

// --- Corpus ---

export const SeveritySchema = z
  .string()
  .transform(s => s.trim().toLowerCase())
  .pipe(z.enum(SEVERITIES));

const LocationsSchema = z
  .union([z.string().trim().min(1), z.array(z.string().trim().min(1)).min(1)])
  .transform(v => (typeof v === 'string' ? [v] : v));

export const ExpectedIssueSchema = z.object({
  title: z.string().trim().min(1),
  severity: SeveritySchema,
  locations: LocationsSchema,
  fix: z.string().trim().min(1),
  description: z.string().optional(),
  category: z.string().optional(),
});

export const CorpusExampleSchema = z
  .object({
    id: z.string().trim().min(1),
    language: z.string().trim().min(1),
    code: z.string().optional(),
    file: z.string().min(1).optional(),
    description: z.string().optional(),
    expectedIssues: z.array(ExpectedIssueSchema),
  })
  .refine(e => (e.code === undefined) !== (e.file === undefined), {
    message: 'Exactly one of "code" or "file" must be given',
  })
  .superRefine((e, ctx) => {
    const seen = new Set<string>();
    e.expectedIssues.forEach((issue, i) => {
      const key = `${issue.title.toLowerCase()}\u0000${issue.severity}`;
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['expectedIssues', i],
          message: `Duplicate expected issue "${issue.title}" (${issue.severity})`,
        });
      }
      seen.add(key);
    });
  });

export const CorpusSchema = z.object({
  examples: z.array(CorpusExampleSchema).min(1),
});

export type CorpusExampleRecord = z.output<typeof CorpusExampleSchema>;

// --- Configuration ---

const unit = z.number().min(0).max(1);
const weight = z.number().finite().nonnegative();

export const SimilarityWeightsSchema = z
  .object({
    text: weight.default(DEFAULT_SIMILARITY_WEIGHTS.text),
    location: weight.default(DEFAULT_SIMILARITY_WEIGHTS.location),
  })
  .strict()
  .refine(w => w.text + w.location > 0, { message: 'Similarity weights must not all be zero' });

export const ScoreWeightsSchema = z
  .object({
    precision: weight.default(DEFAULT_SCORE_WEIGHTS.precision),
    recall: weight.default(DEFAULT_SCORE_WEIGHTS.recall),
    f1: weight.default(DEFAULT_SCORE_WEIGHTS.f1),
    criticalRecall: weight.default(DEFAULT_SCORE_WEIGHTS.criticalRecall),
    severityAccuracy: weight.default(DEFAULT_SCORE_WEIGHTS.severityAccuracy),
    fixQuality: weight.default(DEFAULT_SCORE_WEIGHTS.fixQuality),
  })
  .strict()
  .refine(w => Object.values(w).some(v => v > 0), { message: 'Score weights must not all be zero' });

export const RunConfigSchema = z
  .object({
    similarityThreshold: z.number().gt(0).lt(1).default(DEFAULT_SIMILARITY_THRESHOLD),
    similarityWeights: SimilarityWeightsSchema.default({}),
    scoreWeights: ScoreWeightsSchema.default({}),
    metricThreshold: unit.default(DEFAULT_METRIC_THRESHOLD),
    maxBootstrappedDemos: z.number().int().nonnegative().default(DEFAULT_MAX_BOOTSTRAPPED_DEMOS),
    maxLabeledDemos: z.number().int().nonnegative().default(DEFAULT_MAX_LABELED_DEMOS),
    concurrency: z.number().int().positive().default(DEFAULT_CONCURRENCY),
    callTimeoutMs: z.number().int().positive().default(DEFAULT_CALL_TIMEOUT),
    runTimeoutMs: z.number().int().positive().optional(),
    maxRetries: z.number().int().nonnegative().default(DEFAULT_MAX_RETRIES),
    retryBaseDelayMs: z.number().int().nonnegative().default(DEFAULT_RETRY_BASE_DELAY),
    noiseThreshold: z.number().min(0).lt(1).default(DEFAULT_NOISE_THRESHOLD),
    seed: z.number().int().optional(),
    trainRatio: z.number().gt(0).lt(1).default(DEFAULT_TRAIN_RATIO),
  })
  .strict();

export type RunConfigInput = z.input<typeof RunConfigSchema>;

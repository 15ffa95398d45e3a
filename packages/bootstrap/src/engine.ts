import type {
  Demonstration,
  PromptModule,
  QualityScore,
  RunConfig,
  TrainingExample,
} from '@skillbench/core';
import {
  InvocationError,
  errorMessage,
  fingerprintCorpus,
  resolveConfig,
  silentLogger,
} from '@skillbench/core';
import { scoreOutput } from '@skillbench/scorer';
import { invokeWithRetry, mapWithConcurrency, runFingerprint, runSignal } from '@skillbench/runner';
import type { InvokeOutcome } from '@skillbench/runner';
import { renderIssues } from './prompt.js';
import type {
  BootstrapCandidate,
  BootstrapFailure,
  BootstrapOptions,
  BootstrapResult,
  Metric,
} from './types.js';

export const defaultMetric: Metric = (output, example, config) =>
  scoreOutput(output, example.expectedIssues, config);

type Attempt =
  | { ok: true; candidate: BootstrapCandidate }
  | { ok: false; failure: BootstrapFailure };

async function attemptExample(
  module: PromptModule,
  example: TrainingExample,
  index: number,
  config: RunConfig,
  metric: Metric,
  signal: AbortSignal,
  options: BootstrapOptions,
): Promise<Attempt> {
  const logger = options.logger ?? silentLogger;

  let outcome: InvokeOutcome;
  try {
    outcome = await invokeWithRetry(s => module.run(example, s), {
      timeoutMs: config.callTimeoutMs,
      maxRetries: config.maxRetries,
      retryBaseDelayMs: config.retryBaseDelayMs,
      signal,
      logger,
      label: `${module.name}/${example.id}`,
      random: options.random,
    });
  } catch (err) {
    const kind = err instanceof InvocationError && err.reason !== 'backend' ? 'timeout' : 'invocation';
    logger.warn(`${example.id}: skipped, ${kind} failure: ${errorMessage(err)}`);
    return { ok: false, failure: { exampleId: example.id, kind, message: errorMessage(err) } };
  }

  let score: QualityScore;
  try {
    score = metric(outcome.output, example, config);
  } catch (err) {
    logger.warn(`${example.id}: skipped, scoring failed: ${errorMessage(err)}`);
    return { ok: false, failure: { exampleId: example.id, kind: 'extraction', message: errorMessage(err) } };
  }

  return {
    ok: true,
    candidate: {
      exampleId: example.id,
      index,
      output: outcome.output,
      score,
      accepted: score.overall >= config.metricThreshold,
    },
  };
}

/**
 * Runs `module` over the trainset and keeps its best-scoring outputs as
 * demonstrations. Candidates at or above `metricThreshold` are ranked by
 * score (ties by trainset order) and capped at `maxBootstrappedDemos`; any
 * shortfall is filled with up to `maxLabeledDemos` ground-truth examples,
 * also in trainset order. Examples whose invocation fails are skipped.
 */
export async function bootstrapDemonstrations(
  module: PromptModule,
  trainset: readonly TrainingExample[],
  options: BootstrapOptions = {},
): Promise<BootstrapResult> {
  const config = resolveConfig(options.config);
  const logger = options.logger ?? silentLogger;
  const metric = options.metric ?? defaultMetric;
  const { signal, dispose } = runSignal(config, options.signal);

  logger.info(`Bootstrapping ${module.name} on ${trainset.length} example(s)`);

  let attempts: Attempt[];
  try {
    attempts = await mapWithConcurrency(trainset, config.concurrency, (example, i) =>
      attemptExample(module, example, i, config, metric, signal, options),
    );
  } finally {
    dispose();
  }

  const candidates: BootstrapCandidate[] = [];
  const failures: BootstrapFailure[] = [];
  for (const attempt of attempts) {
    if (attempt.ok) candidates.push(attempt.candidate);
    else failures.push(attempt.failure);
  }

  const selected = candidates
    .filter(c => c.accepted)
    .sort((a, b) => b.score.overall - a.score.overall || a.index - b.index)
    .slice(0, config.maxBootstrappedDemos);

  const bootstrapped: Demonstration[] = selected.map(c => ({
    example: trainset[c.index],
    output: c.output,
    score: c.score,
    source: 'bootstrapped',
  }));

  const taken = new Set(selected.map(c => c.index));
  const shortfall = config.maxBootstrappedDemos - bootstrapped.length;
  const labeled: Demonstration[] = trainset
    .filter((_, i) => !taken.has(i))
    .slice(0, Math.min(shortfall, config.maxLabeledDemos))
    .map(example => ({
      example,
      output: renderIssues(example.expectedIssues),
      score: null,
      source: 'labeled',
    }));

  logger.info(
    `${module.name}: ${bootstrapped.length} bootstrapped + ${labeled.length} labeled demo(s) from ${trainset.length} example(s)` +
      (failures.length > 0 ? `, ${failures.length} skipped` : ''),
  );

  return Object.freeze({
    demonstrations: Object.freeze([...bootstrapped, ...labeled]),
    candidates: Object.freeze(candidates),
    failures: Object.freeze(failures),
    fingerprint: runFingerprint(module, fingerprintCorpus(trainset), config),
  });
}

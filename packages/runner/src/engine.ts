import type {
  Logger,
  MetricName,
  PromptModule,
  RunConfig,
  TrainingExample,
} from '@skillbench/core';
import {
  InvocationError,
  errorMessage,
  fingerprint,
  fingerprintCorpus,
  resolveConfig,
  silentLogger,
} from '@skillbench/core';
import { evaluateOutput, zeroScore } from '@skillbench/scorer';
import type {
  EvaluateOptions,
  EvaluationRun,
  ExampleFailure,
  ExampleResult,
  MetricSummaries,
} from './types.js';
import { invokeWithRetry } from './invoke.js';
import type { InvokeOutcome } from './invoke.js';
import { mapWithConcurrency } from './pool.js';
import { summarize } from './statistics.js';

export function moduleIdentity(module: PromptModule): string {
  return module.fingerprint ?? module.name;
}

export function runFingerprint(module: PromptModule, corpusFingerprint: string, config: RunConfig): string {
  return fingerprint({ module: moduleIdentity(module), corpus: corpusFingerprint, config });
}

/**
 * Links an optional caller signal and the run timeout into one signal. The
 * returned `dispose` clears the timer and listener.
 */
export function runSignal(
  config: Pick<RunConfig, 'runTimeoutMs'>,
  external?: AbortSignal,
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  if (external?.aborted) controller.abort();
  else external?.addEventListener('abort', onAbort, { once: true });

  const timer =
    config.runTimeoutMs !== undefined ? setTimeout(() => controller.abort(), config.runTimeoutMs) : undefined;

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer !== undefined) clearTimeout(timer);
      external?.removeEventListener('abort', onAbort);
    },
  };
}

function failedResult(
  example: TrainingExample,
  failure: ExampleFailure,
  attempts: number,
  start: number,
  output?: string,
): ExampleResult {
  return {
    exampleId: example.id,
    status: 'failed',
    failure,
    attempts,
    durationMs: Math.round(performance.now() - start),
    ...(output !== undefined ? { output } : {}),
    score: zeroScore(),
  };
}

export async function evaluateExample(
  module: PromptModule,
  example: TrainingExample,
  config: RunConfig,
  signal: AbortSignal,
  logger: Logger = silentLogger,
  random?: () => number,
): Promise<ExampleResult> {
  const start = performance.now();

  let outcome: InvokeOutcome;
  try {
    outcome = await invokeWithRetry(s => module.run(example, s), {
      timeoutMs: config.callTimeoutMs,
      maxRetries: config.maxRetries,
      retryBaseDelayMs: config.retryBaseDelayMs,
      signal,
      logger,
      label: `${module.name}/${example.id}`,
      random,
    });
  } catch (err) {
    const invocation = err instanceof InvocationError ? err : undefined;
    const kind = invocation && invocation.reason !== 'backend' ? 'timeout' : 'invocation';
    logger.warn(`${example.id}: ${kind} failure: ${errorMessage(err)}`);
    return failedResult(example, { kind, message: errorMessage(err) }, invocation?.attempts ?? 1, start);
  }

  const { output, attempts } = outcome;
  try {
    const evaluation = evaluateOutput(output, example.expectedIssues, config);
    return {
      exampleId: example.id,
      status: 'ok',
      attempts,
      durationMs: Math.round(performance.now() - start),
      output,
      counts: {
        predicted: evaluation.match.predictedCount,
        expected: evaluation.match.expectedCount,
        matched: evaluation.match.matched.length,
      },
      score: evaluation.score,
    };
  } catch (err) {
    logger.warn(`${example.id}: extraction failure: ${errorMessage(err)}`);
    return failedResult(example, { kind: 'extraction', message: errorMessage(err) }, attempts, start, output);
  }
}

export function summarizeResults(results: readonly ExampleResult[]): MetricSummaries {
  const ok = results.filter(r => r.status === 'ok');
  const stat = (name: MetricName) =>
    summarize(
      ok.flatMap(r => {
        const value = r.score[name];
        return typeof value === 'number' ? [value] : [];
      }),
    );

  return {
    precision: stat('precision'),
    recall: stat('recall'),
    f1: stat('f1'),
    criticalRecall: stat('criticalRecall'),
    severityAccuracy: stat('severityAccuracy'),
    fixQuality: stat('fixQuality'),
    falsePositiveRate: stat('falsePositiveRate'),
    overall: stat('overall'),
  };
}

/**
 * Evaluates `module` on every example of `valset`. Examples run concurrently up
 * to `config.concurrency`; each yields a result even when it fails, and failed
 * examples are left out of the summary but counted in `failureRate`.
 */
export async function evaluateModule(
  module: PromptModule,
  valset: readonly TrainingExample[],
  options: EvaluateOptions = {},
): Promise<EvaluationRun> {
  const config = resolveConfig(options.config);
  const logger = options.logger ?? silentLogger;
  const start = performance.now();
  const { signal, dispose } = runSignal(config, options.signal);

  logger.info(`Evaluating ${module.name} on ${valset.length} example(s)`);

  let completed = 0;
  let results: ExampleResult[];
  try {
    results = await mapWithConcurrency(valset, config.concurrency, async example => {
      const result = await evaluateExample(module, example, config, signal, logger, options.random);
      completed++;
      try {
        options.onProgress?.({ completed, total: valset.length, result });
      } catch (err) {
        logger.warn(`onProgress callback failed: ${errorMessage(err)}`);
      }
      return result;
    });
  } finally {
    dispose();
  }

  const failed = results.filter(r => r.status === 'failed').length;
  const summary = summarizeResults(results);
  const corpusFingerprint = fingerprintCorpus(valset);
  const failureRate = valset.length === 0 ? 0 : failed / valset.length;

  logger.info(
    `${module.name}: overall ${summary.overall.mean.toFixed(3)} over ${valset.length - failed}/${valset.length} example(s)` +
      (failed > 0 ? `, failure rate ${(failureRate * 100).toFixed(1)}%` : ''),
  );

  return Object.freeze({
    module: module.name,
    fingerprint: runFingerprint(module, corpusFingerprint, config),
    corpusFingerprint,
    config,
    results: Object.freeze(results),
    summary,
    total: valset.length,
    succeeded: valset.length - failed,
    failed,
    failureRate,
    durationMs: Math.round(performance.now() - start),
  });
}

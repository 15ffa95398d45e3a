import type { MetricName } from '@skillbench/core';
import { ConfigurationError, fingerprint } from '@skillbench/core';
import type {
  CompareOptions,
  ComparisonReport,
  EvaluationRun,
  MetricDelta,
  RankedRun,
  Verdict,
} from './types.js';
import { cohensD, welchTTest } from './statistics.js';

function metricDelta(baseline: EvaluationRun, candidate: EvaluationRun, name: MetricName): MetricDelta {
  const b = baseline.summary[name].mean;
  const c = candidate.summary[name].mean;
  const delta = c - b;
  return { baseline: b, candidate: c, delta, relativeDelta: b === 0 ? null : delta / b };
}

function overallSamples(run: EvaluationRun): number[] {
  return run.results.filter(r => r.status === 'ok').map(r => r.score.overall);
}

function assertSameExamples(baseline: EvaluationRun, candidate: EvaluationRun): void {
  const a = new Set(baseline.results.map(r => r.exampleId));
  const b = new Set(candidate.results.map(r => r.exampleId));
  const onlyBaseline = [...a].filter(id => !b.has(id));
  const onlyCandidate = [...b].filter(id => !a.has(id));
  if (onlyBaseline.length > 0 || onlyCandidate.length > 0) {
    throw new ConfigurationError(
      `Runs cover different examples (baseline only: ${onlyBaseline.join(', ') || '-'}; candidate only: ${onlyCandidate.join(', ') || '-'})`,
    );
  }
}

// Absorbs float error in differences of means, e.g. 0.51 - 0.5 = 0.010000000000000009.
const EPSILON = 1e-12;

export function verdictFor(delta: number, noiseThreshold: number): Verdict {
  if (delta - noiseThreshold > EPSILON) return 'improved';
  if (delta + noiseThreshold < -EPSILON) return 'regressed';
  return 'no_significant_change';
}

/**
 * Per-metric deltas between two runs over the same examples. The verdict
 * follows the overall mean: only a change larger than the noise threshold
 * counts. Welch's t-test and Cohen's d are reported alongside.
 */
export function compareRuns(
  baseline: EvaluationRun,
  candidate: EvaluationRun,
  options: CompareOptions = {},
): ComparisonReport {
  const noiseThreshold = options.noiseThreshold ?? baseline.config.noiseThreshold;
  if (!Number.isFinite(noiseThreshold) || noiseThreshold < 0 || noiseThreshold >= 1) {
    throw new ConfigurationError(`Invalid noise threshold ${noiseThreshold}: must be in [0, 1)`, [
      { path: 'noiseThreshold', message: 'must be in [0, 1)' },
    ]);
  }
  assertSameExamples(baseline, candidate);

  const metrics: Record<MetricName, MetricDelta> = {
    precision: metricDelta(baseline, candidate, 'precision'),
    recall: metricDelta(baseline, candidate, 'recall'),
    f1: metricDelta(baseline, candidate, 'f1'),
    criticalRecall: metricDelta(baseline, candidate, 'criticalRecall'),
    severityAccuracy: metricDelta(baseline, candidate, 'severityAccuracy'),
    fixQuality: metricDelta(baseline, candidate, 'fixQuality'),
    falsePositiveRate: metricDelta(baseline, candidate, 'falsePositiveRate'),
    overall: metricDelta(baseline, candidate, 'overall'),
  };

  const a = overallSamples(baseline);
  const b = overallSamples(candidate);
  const welch = welchTTest(a, b);

  return Object.freeze({
    baseline: { module: baseline.module, fingerprint: baseline.fingerprint, failureRate: baseline.failureRate },
    candidate: { module: candidate.module, fingerprint: candidate.fingerprint, failureRate: candidate.failureRate },
    metrics,
    verdict: verdictFor(metrics.overall.delta, noiseThreshold),
    noiseThreshold,
    significance: {
      tStatistic: welch.tStatistic,
      degreesOfFreedom: welch.degreesOfFreedom,
      pValue: welch.pValue,
      effectSize: cohensD(a, b),
    },
    fingerprint: fingerprint({
      baseline: baseline.fingerprint,
      candidate: candidate.fingerprint,
      noiseThreshold,
    }),
  });
}

/** Orders runs by overall mean, then by lower failure rate, then input order. */
export function rankRuns(runs: readonly EvaluationRun[]): RankedRun[] {
  return runs
    .map((run, index) => ({ run, index }))
    .sort(
      (x, y) =>
        y.run.summary.overall.mean - x.run.summary.overall.mean ||
        x.run.failureRate - y.run.failureRate ||
        x.index - y.index,
    )
    .map(({ run }, i) => ({
      rank: i + 1,
      module: run.module,
      fingerprint: run.fingerprint,
      overall: run.summary.overall.mean,
      failureRate: run.failureRate,
    }));
}

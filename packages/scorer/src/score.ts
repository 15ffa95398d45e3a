import type { MatchResult, MatchedPair, QualityScore, ScoreWeights, WeightedMetric } from '@skillbench/core';
import { DEFAULT_SCORE_WEIGHTS } from '@skillbench/core';

const WEIGHTED: readonly WeightedMetric[] = [
  'precision',
  'recall',
  'f1',
  'criticalRecall',
  'severityAccuracy',
  'fixQuality',
];

/** A matched prediction with a fix and a consequence statement not lifted from the fix. */
export function hasQualityFix(pair: MatchedPair): boolean {
  const fix = pair.predicted.fix?.trim() ?? '';
  const impact = pair.predicted.impact?.trim() ?? '';
  if (!fix || !impact) return false;
  return !fix.toLowerCase().includes(impact.toLowerCase());
}

export function zeroScore(): QualityScore {
  return {
    precision: 0,
    recall: 0,
    f1: 0,
    criticalRecall: 0,
    severityAccuracy: 0,
    fixQuality: 0,
    falsePositiveRate: 0,
    overall: 0,
    failed: true,
  };
}

export function combine(metrics: Omit<QualityScore, 'overall' | 'failed'>, weights: ScoreWeights): number {
  let total = 0;
  let weightSum = 0;
  for (const name of WEIGHTED) {
    const value = metrics[name];
    if (value === null) continue;
    total += weights[name] * value;
    weightSum += weights[name];
  }
  return weightSum === 0 ? 0 : total / weightSum;
}

export function scoreMatch(match: MatchResult, weights: ScoreWeights = DEFAULT_SCORE_WEIGHTS): QualityScore {
  const matched = match.matched.length;
  const predicted = match.predictedCount;
  const expected = match.expectedCount;

  const precision = predicted === 0 ? 1 : matched / predicted;
  // Undefined when nothing was expected but something was reported.
  const recall = expected === 0 ? (predicted === 0 ? 1 : null) : matched / expected;
  const f1 =
    recall === null ? precision : precision + recall === 0 ? 0 : (2 * precision * recall) / (precision + recall);

  const criticalFound = match.matched.filter(m => m.expected.severity === 'critical').length;
  const criticalMissed = match.falseNegatives.filter(m => m.issue.severity === 'critical').length;
  const criticalTotal = criticalFound + criticalMissed;
  const criticalRecall = criticalTotal === 0 ? 1 : criticalFound / criticalTotal;

  const severityAccuracy = match.matched.filter(m => m.severityMatch).length / Math.max(1, matched);
  const fixQuality = match.matched.filter(hasQualityFix).length / Math.max(1, matched);
  const falsePositiveRate = predicted === 0 ? 0 : match.falsePositives.length / predicted;

  const metrics = { precision, recall, f1, criticalRecall, severityAccuracy, fixQuality, falsePositiveRate };
  return { ...metrics, overall: combine(metrics, weights), failed: false };
}

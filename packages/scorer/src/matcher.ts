import type {
  ExpectedIssue,
  MatchResult,
  MatchedPair,
  PredictedIssue,
  SimilarityWeights,
  UnmatchedIssue,
} from '@skillbench/core';
import { DEFAULT_SIMILARITY_THRESHOLD, DEFAULT_SIMILARITY_WEIGHTS, SEVERITY_ORDER } from '@skillbench/core';
import { issueSimilarity } from './similarity.js';

export interface MatchOptions {
  similarityThreshold?: number;
  similarityWeights?: SimilarityWeights;
}

interface Candidate {
  predictedIndex: number;
  expectedIndex: number;
  similarity: number;
}

/**
 * Greedy one-to-one assignment of predicted to expected issues. Pairs whose
 * similarity exceeds the threshold are fixed highest first; equal similarities
 * prefer the more severe expected issue, then lower indices. Severity
 * disagreement is recorded on the pair but never prevents the match.
 */
export function matchIssues(
  predicted: readonly PredictedIssue[],
  expected: readonly ExpectedIssue[],
  options: MatchOptions = {},
): MatchResult {
  const threshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  const weights = options.similarityWeights ?? DEFAULT_SIMILARITY_WEIGHTS;

  const candidates: Candidate[] = [];
  predicted.forEach((p, pi) => {
    expected.forEach((e, ei) => {
      const similarity = issueSimilarity(p, e, weights);
      if (similarity > threshold) candidates.push({ predictedIndex: pi, expectedIndex: ei, similarity });
    });
  });

  candidates.sort(
    (a, b) =>
      b.similarity - a.similarity ||
      SEVERITY_ORDER[expected[b.expectedIndex].severity] - SEVERITY_ORDER[expected[a.expectedIndex].severity] ||
      a.expectedIndex - b.expectedIndex ||
      a.predictedIndex - b.predictedIndex,
  );

  const usedPredicted = new Set<number>();
  const usedExpected = new Set<number>();
  const matched: MatchedPair[] = [];

  for (const c of candidates) {
    if (usedPredicted.has(c.predictedIndex) || usedExpected.has(c.expectedIndex)) continue;
    usedPredicted.add(c.predictedIndex);
    usedExpected.add(c.expectedIndex);
    const p = predicted[c.predictedIndex];
    const e = expected[c.expectedIndex];
    matched.push({
      predicted: p,
      expected: e,
      predictedIndex: c.predictedIndex,
      expectedIndex: c.expectedIndex,
      similarity: c.similarity,
      severityMatch: p.severity === e.severity,
    });
  }

  const falsePositives: UnmatchedIssue<PredictedIssue>[] = [];
  predicted.forEach((issue, index) => {
    if (!usedPredicted.has(index)) falsePositives.push({ issue, index });
  });

  const falseNegatives: UnmatchedIssue<ExpectedIssue>[] = [];
  expected.forEach((issue, index) => {
    if (!usedExpected.has(index)) falseNegatives.push({ issue, index });
  });

  return {
    matched,
    falsePositives,
    falseNegatives,
    predictedCount: predicted.length,
    expectedCount: expected.length,
  };
}

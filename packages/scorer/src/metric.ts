import type { ExpectedIssue, MatchResult, QualityScore, RunConfig } from '@skillbench/core';
import { DEFAULT_SCORE_WEIGHTS, DEFAULT_SIMILARITY_THRESHOLD, DEFAULT_SIMILARITY_WEIGHTS } from '@skillbench/core';
import { extractIssues } from '@skillbench/extractor';
import type { ExtractionResult } from '@skillbench/extractor';
import { matchIssues } from './matcher.js';
import { scoreMatch } from './score.js';

export type ScoringConfig = Pick<RunConfig, 'similarityThreshold' | 'similarityWeights' | 'scoreWeights'>;

export const DEFAULT_SCORING: ScoringConfig = {
  similarityThreshold: DEFAULT_SIMILARITY_THRESHOLD,
  similarityWeights: DEFAULT_SIMILARITY_WEIGHTS,
  scoreWeights: DEFAULT_SCORE_WEIGHTS,
};

export interface OutputEvaluation {
  extraction: ExtractionResult;
  match: MatchResult;
  score: QualityScore;
}

export function evaluateOutput(
  output: string,
  expected: readonly ExpectedIssue[],
  config: ScoringConfig = DEFAULT_SCORING,
): OutputEvaluation {
  const extraction = extractIssues(output);
  const match = matchIssues(extraction.issues, expected, {
    similarityThreshold: config.similarityThreshold,
    similarityWeights: config.similarityWeights,
  });
  return { extraction, match, score: scoreMatch(match, config.scoreWeights) };
}

export function scoreOutput(
  output: string,
  expected: readonly ExpectedIssue[],
  config: ScoringConfig = DEFAULT_SCORING,
): QualityScore {
  return evaluateOutput(output, expected, config).score;
}

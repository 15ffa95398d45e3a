export { matchIssues } from './matcher.js';
export type { MatchOptions } from './matcher.js';
export { scoreMatch, zeroScore, hasQualityFix } from './score.js';
export { evaluateOutput, scoreOutput, DEFAULT_SCORING } from './metric.js';
export type { OutputEvaluation, ScoringConfig } from './metric.js';
export {
  tokenize,
  jaccard,
  textSimilarity,
  locationSimilarity,
  normalizeLocation,
  issueSimilarity,
} from './similarity.js';

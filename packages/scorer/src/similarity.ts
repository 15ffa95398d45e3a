import type { ExpectedIssue, PredictedIssue, SimilarityWeights } from '@skillbench/core';
import { DEFAULT_SIMILARITY_WEIGHTS, UNKNOWN } from '@skillbench/core';

const STOPWORDS = new Set([
  'a', 'an', 'the', 'in', 'on', 'at', 'of', 'to', 'for', 'and', 'or', 'is', 'are',
  'be', 'with', 'by', 'from', 'this', 'that', 'it', 'as', 'not', 'no',
]);

export function tokenize(text: string): Set<string> {
  const tokens = new Set<string>();
  for (const m of text.toLowerCase().matchAll(/[a-z0-9]+/g)) {
    if (!STOPWORDS.has(m[0])) tokens.add(m[0]);
  }
  return tokens;
}

export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 0;
  let shared = 0;
  for (const t of a) if (b.has(t)) shared++;
  return shared / (a.size + b.size - shared);
}

function titleOf(issue: { title: string }): string {
  return issue.title === UNKNOWN ? '' : issue.title;
}

export function textSimilarity(predicted: PredictedIssue, expected: ExpectedIssue): number {
  const pTitle = titleOf(predicted);
  const eTitle = titleOf(expected);
  const byTitle = jaccard(tokenize(pTitle), tokenize(eTitle));
  const byBody = jaccard(
    tokenize(`${pTitle} ${predicted.description}`),
    tokenize(`${eTitle} ${expected.description ?? ''}`),
  );
  return Math.max(byTitle, byBody);
}

export function normalizeLocation(location: string): string {
  return location
    .toLowerCase()
    .replace(/[`'"]/g, '')
    .replace(/\(\)/g, '')
    .replace(/\s*:\s*/g, ':')
    .trim();
}

function locationPairSimilarity(a: string, b: string): number {
  if (a === b) return 1;
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  if (shorter && longer.startsWith(shorter)) {
    const boundary = longer[shorter.length];
    if (boundary === ':' || boundary === '.') return 0.5;
  }
  return 0;
}

/**
 * Best location agreement over all pairs: 1 exact, 0.5 when one is a prefix of the
 * other at a ':' or '.' boundary ("login" vs "login:12"), else 0. Null when either
 * side names no location.
 */
export function locationSimilarity(predicted: readonly string[], expected: readonly string[]): number | null {
  const p = predicted.map(normalizeLocation).filter(l => l.length > 0);
  const e = expected.map(normalizeLocation).filter(l => l.length > 0);
  if (p.length === 0 || e.length === 0) return null;

  let best = 0;
  for (const a of p) {
    for (const b of e) {
      best = Math.max(best, locationPairSimilarity(a, b));
      if (best === 1) return 1;
    }
  }
  return best;
}

export function issueSimilarity(
  predicted: PredictedIssue,
  expected: ExpectedIssue,
  weights: SimilarityWeights = DEFAULT_SIMILARITY_WEIGHTS,
): number {
  const text = textSimilarity(predicted, expected);
  const location = locationSimilarity(predicted.locations, expected.locations);
  if (location === null || weights.location === 0) return text;
  if (weights.text === 0) return location;
  return (weights.text * text + weights.location * location) / (weights.text + weights.location);
}

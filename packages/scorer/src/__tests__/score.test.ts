import { describe, it, expect } from 'vitest';
import { matchIssues } from '../matcher.js';
import { scoreMatch, zeroScore } from '../score.js';
import { scoreOutput } from '../metric.js';
import { expected, predicted } from './helpers.js';

describe('scoreMatch', () => {
  it('scores a perfect match', () => {
    const score = scoreMatch(matchIssues([predicted('SQLi', 'critical')], [expected('SQLi', 'critical')]));
    expect(score).toMatchObject({
      precision: 1,
      recall: 1,
      f1: 1,
      criticalRecall: 1,
      severityAccuracy: 1,
      fixQuality: 0,
      falsePositiveRate: 0,
      failed: false,
    });
    expect(score.overall).toBeCloseTo(0.7);
  });

  it('treats an empty prediction as precise but without recall', () => {
    const score = scoreMatch(matchIssues([], [expected('SQLi', 'critical')]));
    expect(score.precision).toBe(1);
    expect(score.recall).toBe(0);
    expect(score.f1).toBe(0);
    expect(score.criticalRecall).toBe(0);
  });

  it('gives full precision and recall on clean code with nothing reported', () => {
    const score = scoreMatch(matchIssues([], []));
    expect(score).toMatchObject({ precision: 1, recall: 1, f1: 1, criticalRecall: 1, falsePositiveRate: 0 });
  });

  it('leaves recall undefined for false positives on clean code', () => {
    const score = scoreMatch(matchIssues([predicted('Style nit', 'low')], []));
    expect(score.recall).toBeNull();
    expect(score.precision).toBe(0);
    expect(score.f1).toBe(0);
    expect(score.falsePositiveRate).toBe(1);
    expect(score.criticalRecall).toBe(1);
    expect(score.overall).toBeCloseTo(0.3);
  });

  it('keeps critical recall at 1 without critical expectations', () => {
    const score = scoreMatch(matchIssues([predicted('Anything', 'critical')], [expected('Log noise', 'low')]));
    expect(score.criticalRecall).toBe(1);
  });

  it('counts fixes that come with a separate impact statement', () => {
    const good = predicted('SQLi', 'critical', ['f:10'], { fix: 'Use params', impact: 'Attackers can dump the table' });
    const echoed = predicted('SQLi', 'critical', ['f:10'], { fix: 'Use params so attackers cannot dump the table', impact: 'attackers cannot dump the table' });
    expect(scoreMatch(matchIssues([good], [expected('SQLi', 'critical')])).fixQuality).toBe(1);
    expect(scoreMatch(matchIssues([echoed], [expected('SQLi', 'critical')])).fixQuality).toBe(0);
  });

  it('normalises custom weights over the defined metrics', () => {
    const weights = { precision: 1, recall: 1, f1: 0, criticalRecall: 0, severityAccuracy: 0, fixQuality: 0 };
    const clean = scoreMatch(matchIssues([predicted('Style nit', 'low')], []), weights);
    expect(clean.overall).toBe(0);
    const half = scoreMatch(
      matchIssues([predicted('SQLi', 'critical'), predicted('Open redirect', 'low', ['r:1'])], [expected('SQLi', 'critical')]),
      weights,
    );
    expect(half.overall).toBe(0.75);
  });

  it('keeps every metric within [0, 1]', () => {
    const cases = [
      matchIssues([], []),
      matchIssues([predicted('a', 'unknown', [])], []),
      matchIssues([], [expected('b', 'critical')]),
      matchIssues([predicted('b', 'high')], [expected('b', 'critical'), expected('c', 'low')]),
    ];
    for (const m of cases) {
      const s = scoreMatch(m);
      for (const v of [s.precision, s.recall ?? 0, s.f1, s.criticalRecall, s.severityAccuracy, s.fixQuality, s.overall]) {
        expect(v).toBeGreaterThanOrEqual(0);
        expect(v).toBeLessThanOrEqual(1);
      }
    }
  });

  it('provides a failed zero score', () => {
    expect(zeroScore()).toMatchObject({ overall: 0, recall: 0, failed: true });
  });
});

describe('scoreOutput', () => {
  it('runs extract, match and score over raw text', () => {
    const output = [
      '1. [Critical] SQL injection in login',
      '   Location: login:12',
      '   Attackers can read every user row.',
      '   Fix: use parameterized queries',
    ].join('\n');
    const score = scoreOutput(output, [
      expected('SQL injection in login', 'critical', ['login:12'], { fix: 'Use parameterized queries' }),
    ]);
    expect(score).toMatchObject({ precision: 1, recall: 1, criticalRecall: 1, severityAccuracy: 1, fixQuality: 1 });
    expect(score.overall).toBeCloseTo(1);
  });

  it('gives no fix credit when the review never explains the consequence', () => {
    const output = ['1. [Critical] SQL injection in login', '   Location: login:12', '   Fix: use parameterized queries'].join('\n');
    const score = scoreOutput(output, [expected('SQL injection in login', 'critical', ['login:12'])]);
    expect(score.recall).toBe(1);
    expect(score.fixQuality).toBe(0);
  });

  it('scores an empty review of clean code', () => {
    expect(scoreOutput('No issues found.', []).recall).toBe(1);
  });
});

import { describe, it, expect } from 'vitest';
import { canonicalize } from '../canonical.js';
import { fingerprint, fingerprintCorpus, isFingerprint } from '../fingerprint.js';
import type { TrainingExample } from '../types.js';

const example: TrainingExample = {
  id: 'auth',
  language: 'python',
  code: 'def login(): pass',
  expectedIssues: [
    { title: 'SQL injection', severity: 'critical', locations: ['login:1'], fix: 'Bind parameters' },
  ],
};

describe('canonicalize', () => {
  it('sorts object keys and drops whitespace', () => {
    expect(canonicalize({ b: 1, a: { d: 2, c: 3 } })).toBe('{"a":{"c":3,"d":2},"b":1}');
  });

  it('omits undefined properties', () => {
    expect(canonicalize({ a: 1, b: undefined })).toBe('{"a":1}');
  });
});

describe('fingerprint', () => {
  it('is independent of key order', () => {
    expect(fingerprint({ a: 1, b: 2 })).toBe(fingerprint({ b: 2, a: 1 }));
  });

  it('changes when a value changes', () => {
    expect(fingerprint({ a: 1 })).not.toBe(fingerprint({ a: 2 }));
  });

  it('produces a sha256 hash string', () => {
    expect(isFingerprint(fingerprint([1, 2, 3]))).toBe(true);
    expect(isFingerprint('sha256:abc')).toBe(false);
  });
});

describe('fingerprintCorpus', () => {
  it('is stable for equal corpora', () => {
    expect(fingerprintCorpus([example])).toBe(fingerprintCorpus([{ ...example }]));
  });

  it('depends on example order', () => {
    const other: TrainingExample = { ...example, id: 'other' };
    expect(fingerprintCorpus([example, other])).not.toBe(fingerprintCorpus([other, example]));
  });

  it('ignores the free-text description', () => {
    expect(fingerprintCorpus([example])).toBe(fingerprintCorpus([{ ...example, description: 'notes' }]));
  });
});

import { createHash } from 'node:crypto';
import { canonicalize } from './canonical.js';
import type { TrainingExample } from './types.js';

const FINGERPRINT_RE = /^sha256:[0-9a-f]{64}$/;

export function fingerprint(value: unknown): string {
  const hex = createHash('sha256').update(canonicalize(value), 'utf8').digest('hex');
  return `sha256:${hex}`;
}

export function isFingerprint(value: string): boolean {
  return FINGERPRINT_RE.test(value);
}

export function fingerprintCorpus(examples: readonly TrainingExample[]): string {
  return fingerprint(
    examples.map(e => ({
      id: e.id,
      language: e.language,
      code: e.code,
      expectedIssues: e.expectedIssues,
    })),
  );
}

import type { TrainingExample } from '@skillbench/core';
import { ConfigurationError, CorpusError, seededShuffle } from '@skillbench/core';
import type { CorpusSplit } from './types.js';

/**
 * Splits a corpus into train and validation sets. With a seed the corpus is
 * shuffled first; without one the input order is kept. Both sides get at
 * least one example.
 */
export function splitCorpus(
  examples: readonly TrainingExample[],
  ratio: number,
  seed?: number,
): CorpusSplit {
  if (!(ratio > 0 && ratio < 1)) {
    throw new ConfigurationError(`Invalid train ratio ${ratio}: must be in (0, 1)`, [
      { path: 'trainRatio', message: 'must be in (0, 1)' },
    ]);
  }
  if (examples.length < 2) {
    throw new CorpusError(`Cannot split ${examples.length} example(s): need at least 2`);
  }

  const ordered = seed !== undefined ? seededShuffle(examples, seed) : [...examples];
  const cut = Math.min(Math.max(Math.floor(ordered.length * ratio), 1), ordered.length - 1);
  return {
    trainset: Object.freeze(ordered.slice(0, cut)),
    valset: Object.freeze(ordered.slice(cut)),
  };
}

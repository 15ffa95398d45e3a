import { describe, it, expect } from 'vitest';
import { ConfigurationError, CorpusError } from '@skillbench/core';
import { splitCorpus } from '../split.js';
import { trainset } from './helpers.js';

const ids = (examples: readonly { id: string }[]) => examples.map(e => e.id);

describe('splitCorpus', () => {
  it('keeps input order without a seed', () => {
    const split = splitCorpus(trainset(10), 0.8);
    expect(ids(split.trainset)).toEqual(['ex1', 'ex2', 'ex3', 'ex4', 'ex5', 'ex6', 'ex7', 'ex8']);
    expect(ids(split.valset)).toEqual(['ex9', 'ex10']);
  });

  it('leaves at least one example on each side', () => {
    expect(ids(splitCorpus(trainset(3), 0.1).trainset)).toEqual(['ex1']);
    expect(ids(splitCorpus(trainset(2), 0.9).valset)).toEqual(['ex2']);
  });

  it('shuffles deterministically with a seed', () => {
    const a = splitCorpus(trainset(10), 0.5, 42);
    const b = splitCorpus(trainset(10), 0.5, 42);

    expect(ids(a.trainset)).toEqual(ids(b.trainset));
    expect([...ids(a.trainset), ...ids(a.valset)].sort()).toEqual(ids(trainset(10)).sort());
    expect(a.trainset).toHaveLength(5);
  });

  it('rejects ratios outside (0, 1) and corpora too small to split', () => {
    expect(() => splitCorpus(trainset(4), 1)).toThrow(ConfigurationError);
    expect(() => splitCorpus(trainset(4), 0)).toThrow(ConfigurationError);
    expect(() => splitCorpus(trainset(1), 0.5)).toThrow(CorpusError);
  });
});

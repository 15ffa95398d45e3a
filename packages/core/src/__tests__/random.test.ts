import { describe, it, expect } from 'vitest';
import { createRng, seededShuffle } from '../random.js';

describe('createRng', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = createRng(42);
    const b = createRng(42);
    const seqA = [a(), a(), a(), a()];
    const seqB = [b(), b(), b(), b()];
    expect(seqA).toEqual(seqB);
  });

  it('yields values in [0, 1)', () => {
    const rng = createRng(7);
    for (let i = 0; i < 1000; i++) {
      const v = rng();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it('differs across seeds', () => {
    expect(createRng(1)()).not.toBe(createRng(2)());
  });
});

describe('seededShuffle', () => {
  const items = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'];

  it('is a permutation of the input', () => {
    expect([...seededShuffle(items, 3)].sort()).toEqual(items);
  });

  it('is deterministic for a fixed seed', () => {
    expect(seededShuffle(items, 11)).toEqual(seededShuffle(items, 11));
  });

  it('does not mutate its input', () => {
    const copy = [...items];
    seededShuffle(items, 5);
    expect(items).toEqual(copy);
  });
});

import { describe, it, expect } from 'vitest';
import { mapWithConcurrency } from '../pool.js';

const delay = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe('mapWithConcurrency', () => {
  it('keeps input order regardless of completion order', async () => {
    const out = await mapWithConcurrency([30, 5, 15, 0], 4, async (ms, i) => {
      await delay(ms);
      return `${i}:${ms}`;
    });
    expect(out).toEqual(['0:30', '1:5', '2:15', '3:0']);
  });

  it('never runs more than the limit at once', async () => {
    let active = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
    });
    expect(peak).toBe(3);
  });

  it('handles an empty list', async () => {
    await expect(mapWithConcurrency([], 2, async () => 1)).resolves.toEqual([]);
  });
});

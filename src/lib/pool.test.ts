import { describe, expect, it } from 'vitest';
import { mapWithConcurrency } from './pool.js';

const tick = (ms: number) => new Promise((r) => setTimeout(r, ms));

describe('mapWithConcurrency', () => {
  it('keeps input order regardless of completion order', async () => {
    const out = await mapWithConcurrency([30, 5, 15, 1], 4, async (ms, i) => {
      await tick(ms);
      return `${i}:${ms}`;
    });
    expect(out).toEqual(['0:30', '1:5', '2:15', '3:1']);
  });

  it('bounds the number of tasks in flight', async () => {
    let active = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 3, async () => {
      active += 1;
      peak = Math.max(peak, active);
      await tick(2);
      active -= 1;
    });
    expect(peak).toBe(3);
  });

  it('returns [] for no items', async () => {
    expect(await mapWithConcurrency([], 3, async () => 1)).toEqual([]);
  });

  it('rejects with the first error and stops taking new items', async () => {
    const started: number[] = [];
    const p = mapWithConcurrency([1, 2, 3, 4, 5], 1, async (n) => {
      started.push(n);
      if (n === 2) throw new Error('fatal');
      return n;
    });
    await expect(p).rejects.toThrow('fatal');
    expect(started).toEqual([1, 2]);
  });
});

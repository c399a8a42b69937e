import { describe, it, expect } from 'vitest';
import { WorkerPool, mapWithConcurrency } from './worker-pool.js';
import { sleep } from './retry.js';

describe('WorkerPool', () => {
  it('rejects an invalid concurrency', () => {
    expect(() => new WorkerPool(0)).toThrow(RangeError);
    expect(() => new WorkerPool(1.5)).toThrow(RangeError);
  });

  it('never runs more than the configured number of tasks', async () => {
    const pool = new WorkerPool(2);
    let inFlight = 0;
    let peak = 0;

    const task = async (): Promise<void> => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(5);
      inFlight--;
    };

    await Promise.all([1, 2, 3, 4, 5].map(() => pool.run(task)));

    expect(peak).toBe(2);
    expect(pool.running).toBe(0);
    expect(pool.pending).toBe(0);
  });

  it('keeps running after a task rejects', async () => {
    const pool = new WorkerPool(1);

    const failed = pool.run(async () => {
      throw new Error('task failed');
    });
    const next = pool.run(async () => 'next');

    await expect(failed).rejects.toThrow('task failed');
    await expect(next).resolves.toBe('next');
  });
});

describe('mapWithConcurrency', () => {
  it('preserves input order regardless of completion order', async () => {
    const delays = [30, 5, 15, 0];

    const result = await mapWithConcurrency(delays, 3, async (delay, index) => {
      await sleep(delay);
      return `item-${index}`;
    });

    expect(result).toEqual(['item-0', 'item-1', 'item-2', 'item-3']);
  });
});

/**
 * Tests for the bounded worker pool
 */

import { describe, it, expect, vi } from 'vitest';
import {
  DEFAULT_PARALLELISM,
  MAX_PARALLELISM,
  mapWithConcurrency,
  resolveParallelism
} from '../../shared/concurrency';

const wait = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

describe('resolveParallelism', () => {
  it('should clamp to the amount of work and the cap', () => {
    expect(resolveParallelism(10)).toBe(DEFAULT_PARALLELISM);
    expect(resolveParallelism(2, 8)).toBe(2);
    expect(resolveParallelism(100, 50)).toBe(MAX_PARALLELISM);
    expect(resolveParallelism(100, 50, 20)).toBe(20);
  });

  it('should never go below one lane', () => {
    expect(resolveParallelism(0)).toBe(1);
    expect(resolveParallelism(5, 0.5)).toBe(1);
    expect(resolveParallelism(5, NaN)).toBe(1);
  });
});

describe('mapWithConcurrency', () => {
  it('should keep input order regardless of completion order', async () => {
    const results = await mapWithConcurrency([30, 5, 15], 3, async (ms, index) => {
      await wait(ms);
      return `${index}:${ms}`;
    });

    expect(results).toEqual(['0:30', '1:5', '2:15']);
  });

  it('should keep at most limit items in flight', async () => {
    let inFlight = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await wait(2);
      inFlight--;
    });

    expect(peak).toBe(3);
  });

  it('should stop starting work after the first failure', async () => {
    const worker = vi.fn(async (item: number) => {
      if (item === 2) {
        throw new Error('item 2 failed');
      }
      return item;
    });

    await expect(mapWithConcurrency([1, 2, 3], 1, worker)).rejects.toThrow('item 2 failed');
    expect(worker).toHaveBeenCalledTimes(2);
  });

  it('should reject before starting when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const worker = vi.fn(async (item: number) => item);

    await expect(mapWithConcurrency([1, 2], 2, worker, { signal: controller.signal }))
      .rejects.toMatchObject({ name: 'AbortError', message: 'Operation aborted' });
    expect(worker).not.toHaveBeenCalled();
  });

  it('should stop launching work once aborted mid-run', async () => {
    const controller = new AbortController();
    const worker = vi.fn(async (item: number) => {
      controller.abort();
      return item;
    });

    await expect(mapWithConcurrency([1, 2, 3], 1, worker, {
      signal: controller.signal,
      abortError: () => new Error('scoring cancelled')
    })).rejects.toThrow('scoring cancelled');
    expect(worker).toHaveBeenCalledTimes(1);
  });

  it('should return an empty array for no items', async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});

/**
 * Channel and Worker Pool Unit Tests
 */

import { describe, expect, it } from 'vitest';
import { Channel, WorkerPool } from '../../src/shared/process.js';

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('process', () => {
  // ============================================================================
  // CHANNEL
  // ============================================================================

  describe('Channel', () => {
    it('should deliver buffered values and end once closed', async () => {
      const channel = new Channel<number>();
      channel.send(1);
      channel.send(2);
      channel.close();

      expect(await collect(channel)).toEqual([1, 2]);
    });

    it('should wake a waiting consumer', async () => {
      const channel = new Channel<string>();
      const consumed = collect(channel);

      await delay(1);
      channel.send('late');
      channel.close();

      expect(await consumed).toEqual(['late']);
    });

    it('should refuse sends after close', () => {
      const channel = new Channel<number>();
      channel.close();

      expect(() => channel.send(1)).toThrow('Cannot send on a closed channel');
    });
  });

  // ============================================================================
  // WORKER POOL
  // ============================================================================

  describe('WorkerPool', () => {
    it('should reject a size below one', () => {
      expect(
        () => new WorkerPool<number, number>({ size: 0, worker: async (n) => n, onError: () => -1 }),
      ).toThrow('Worker pool size must be at least 1 (got 0)');
    });

    it('should never run more workers than its size', async () => {
      let active = 0;
      let peak = 0;
      const pool = new WorkerPool<number, number>({
        size: 2,
        worker: async (n) => {
          active++;
          peak = Math.max(peak, active);
          await delay(5);
          active--;
          return n * 10;
        },
        onError: () => -1,
      });

      const results = await collect(pool.run([1, 2, 3, 4, 5]));

      expect(peak).toBe(2);
      expect([...results].sort((a, b) => a - b)).toEqual([10, 20, 30, 40, 50]);
    });

    it('should yield results in completion order', async () => {
      const pool = new WorkerPool<number, number>({
        size: 2,
        worker: async (ms) => {
          await delay(ms);
          return ms;
        },
        onError: () => -1,
      });

      expect(await collect(pool.run([40, 5]))).toEqual([5, 40]);
    });

    it('should turn a rejected item into a result and keep going', async () => {
      const pool = new WorkerPool<number, string>({
        size: 1,
        worker: async (n) => {
          if (n === 2) throw new Error('disk full');
          return `ok ${n}`;
        },
        onError: (n, error) => `failed ${n}: ${error instanceof Error ? error.message : String(error)}`,
      });

      expect(await collect(pool.run([1, 2, 3]))).toEqual(['ok 1', 'failed 2: disk full', 'ok 3']);
    });

    it('should stop taking items once cancelled', async () => {
      let cancelled = false;
      const started: number[] = [];
      const pool = new WorkerPool<number, number>({
        size: 1,
        worker: async (n) => {
          started.push(n);
          cancelled = true;
          return n;
        },
        onError: () => -1,
        isCancelled: () => cancelled,
      });

      expect(await collect(pool.run([1, 2, 3]))).toEqual([1]);
      expect(started).toEqual([1]);
    });
  });
});

import { describe, it, expect } from 'vitest';
import { Semaphore, runPool, defaultPoolSize } from '../src/index.js';

describe('Semaphore', () => {
  it('starts full', () => {
    const sem = new Semaphore(3);
    expect(sem.available).toBe(3);
    expect(sem.capacity).toBe(3);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
  });

  it('blocks when empty and serves waiters in order', async () => {
    const sem = new Semaphore(1);
    await sem.acquire();
    const order: number[] = [];
    const first = sem.acquire().then(() => order.push(1));
    const second = sem.acquire().then(() => order.push(2));
    expect(sem.waiting).toBe(2);

    sem.release();
    await first;
    sem.release();
    await second;
    expect(order).toEqual([1, 2]);
    sem.release();
    expect(sem.available).toBe(1);
  });

  it('use releases on failure', async () => {
    const sem = new Semaphore(2);
    await expect(
      sem.use(async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(sem.available).toBe(2);
  });

  it('over-release throws', () => {
    const sem = new Semaphore(1);
    expect(() => sem.release()).toThrow(/released more times/);
  });

  it('independent instances do not share permits', async () => {
    const a = new Semaphore(1);
    const b = new Semaphore(1);
    await a.acquire();
    expect(b.available).toBe(1);
    a.release();
  });
});

describe('runPool', () => {
  it('never runs more than size at once', async () => {
    let running = 0;
    let peak = 0;
    const seen: number[] = [];
    await runPool([1, 2, 3, 4, 5, 6, 7], 3, async (n) => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((r) => setTimeout(r, 5));
      seen.push(n);
      running--;
    });
    expect(peak).toBe(3);
    expect(seen.sort()).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  it('finishes every item before rethrowing the first failure', async () => {
    const done: number[] = [];
    await expect(
      runPool([1, 2, 3], 1, async (n) => {
        if (n === 1) throw new Error('first');
        done.push(n);
      }),
    ).rejects.toThrow('first');
    expect(done).toEqual([2, 3]);
  });

  it('handles an empty list', async () => {
    await expect(runPool([], 4, async () => {})).resolves.toBeUndefined();
  });
});

describe('defaultPoolSize', () => {
  it('stays within 2..8', () => {
    const size = defaultPoolSize();
    expect(size).toBeGreaterThanOrEqual(2);
    expect(size).toBeLessThanOrEqual(8);
  });
});

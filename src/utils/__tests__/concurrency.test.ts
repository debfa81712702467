import { describe, it, expect } from 'vitest';
import { Mutex, Semaphore } from '../concurrency.js';

describe('Mutex', () => {
  it('grants the lock in request order', async () => {
    const mutex = new Mutex();
    const order: number[] = [];

    const releaseFirst = await mutex.acquire();
    const second = mutex.acquire().then(release => {
      order.push(2);
      release();
    });
    const third = mutex.acquire().then(release => {
      order.push(3);
      release();
    });

    expect(mutex.isLocked).toBe(true);
    expect(mutex.pending).toBe(2);

    order.push(1);
    releaseFirst();
    await Promise.all([second, third]);

    expect(order).toEqual([1, 2, 3]);
    expect(mutex.isLocked).toBe(false);
  });

  it('ignores a second release', async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire();
    const waiting = mutex.acquire();

    release();
    release();
    const releaseNext = await waiting;

    expect(mutex.isLocked).toBe(true);
    releaseNext();
    expect(mutex.isLocked).toBe(false);
  });
});

describe('Semaphore', () => {
  it('requires at least one permit', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
  });

  it('queues acquirers beyond the permit count', async () => {
    const semaphore = new Semaphore(1);
    const release = await semaphore.acquire();

    let acquired = false;
    const next = semaphore.acquire().then(releaseNext => {
      acquired = true;
      return releaseNext;
    });

    await new Promise(resolve => setTimeout(resolve, 0));
    expect(acquired).toBe(false);

    release();
    (await next)();
    expect(acquired).toBe(true);
  });
});

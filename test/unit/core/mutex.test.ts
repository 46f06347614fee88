import { describe, it, expect } from 'vitest';
import { AsyncMutex, KeyedMutex } from '../../../src/core/mutex.js';

const tick = (ms = 1) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('AsyncMutex', () => {
  it('is held between acquire and release', async () => {
    const mutex = new AsyncMutex();
    const release = await mutex.acquire();
    expect(mutex.isLocked).toBe(true);
    release();
    expect(mutex.isLocked).toBe(false);
    expect(mutex.acquisitions).toBe(1);
  });

  it('grants waiters in arrival order', async () => {
    const mutex = new AsyncMutex();
    const order: string[] = [];

    const holders = ['a', 'b', 'c'].map((name) =>
      mutex.acquire().then(async (release) => {
        order.push(name);
        await tick();
        release();
      }),
    );
    expect(mutex.queueLength).toBe(2);

    await Promise.all(holders);
    expect(order).toEqual(['a', 'b', 'c']);
    expect(mutex.isLocked).toBe(false);
    expect(mutex.acquisitions).toBe(3);
  });

  it('keeps the lock held while handing it to the next waiter', async () => {
    const mutex = new AsyncMutex();
    const release = await mutex.acquire();
    const next = mutex.acquire();

    release();
    release();
    expect(mutex.isLocked).toBe(true);
    expect(mutex.tryAcquire()).toBeNull();

    const releaseNext = await next;
    releaseNext();
    expect(mutex.isLocked).toBe(false);
  });

  it('tryAcquire takes only a free lock', () => {
    const mutex = new AsyncMutex();
    const release = mutex.tryAcquire();
    expect(release).not.toBeNull();
    expect(mutex.tryAcquire()).toBeNull();
    release?.();
    expect(mutex.isLocked).toBe(false);
  });

  it('withLock returns the body result and releases on throw', async () => {
    const mutex = new AsyncMutex();
    await expect(mutex.withLock(() => 'done')).resolves.toBe('done');
    await expect(
      mutex.withLock(() => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(mutex.isLocked).toBe(false);
  });

  it('never overlaps async bodies', async () => {
    const mutex = new AsyncMutex();
    let active = 0;
    let peak = 0;
    const body = () =>
      mutex.withLock(async () => {
        active++;
        peak = Math.max(peak, active);
        await tick();
        active--;
      });

    await Promise.all([body(), body(), body(), body()]);
    expect(peak).toBe(1);
  });
});

describe('KeyedMutex', () => {
  it('serializes work per key and runs different keys side by side', async () => {
    const locks = new KeyedMutex<string>();
    const events: string[] = [];
    const job = (key: string, name: string) =>
      locks.run(key, async () => {
        events.push(`start ${name}`);
        await tick();
        events.push(`end ${name}`);
      });

    await Promise.all([job('x', 'x1'), job('x', 'x2'), job('y', 'y1')]);

    expect(events.indexOf('end x1')).toBeLessThan(events.indexOf('start x2'));
    expect(events.indexOf('start y1')).toBeLessThan(events.indexOf('end x1'));
  });

  it('reports waiters and created keys', async () => {
    const locks = new KeyedMutex<number>();
    expect(locks.waiting(1)).toBe(0);
    expect(locks.isLocked(1)).toBe(false);

    const first = locks.run(1, () => tick(5));
    const second = locks.run(1, () => 'second');
    expect(locks.isLocked(1)).toBe(true);
    expect(locks.waiting(1)).toBe(1);

    await first;
    await expect(second).resolves.toBe('second');
    expect(locks.keys()).toEqual([1]);
    expect(locks.waiting(1)).toBe(0);
  });
});

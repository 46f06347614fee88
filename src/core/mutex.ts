/**
 * Exclusive locks for async callers.
 *
 * AsyncMutex hands the lock straight from one holder to the next waiter in
 * FIFO order. KeyedMutex keeps one AsyncMutex per key, created on first
 * use; the dispatcher keys it by policy kind.
 */

export type Release = () => void;

export class AsyncMutex {
  private held = false;
  private waiters: Array<(release: Release) => void> = [];
  private grants = 0;

  /**
   * Resolves with a release function once the lock is held.
   * Calling the release function more than once has no effect.
   */
  acquire(): Promise<Release> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve(this.grant());
    }
    return new Promise<Release>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Take the lock only if it is free right now */
  tryAcquire(): Release | null {
    if (this.held) return null;
    this.held = true;
    return this.grant();
  }

  async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get isLocked(): boolean {
    return this.held;
  }

  get queueLength(): number {
    return this.waiters.length;
  }

  /** How many times the lock has been granted */
  get acquisitions(): number {
    return this.grants;
  }

  private grant(): Release {
    this.grants++;
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next === undefined) {
        this.held = false;
        return;
      }
      // Still held: ownership passes to the next waiter
      queueMicrotask(() => next(this.grant()));
    };
  }
}

export class KeyedMutex<K> {
  private locks: Map<K, AsyncMutex> = new Map();

  run<T>(key: K, fn: () => T | Promise<T>): Promise<T> {
    return this.lockFor(key).withLock(fn);
  }

  isLocked(key: K): boolean {
    return this.locks.get(key)?.isLocked ?? false;
  }

  waiting(key: K): number {
    return this.locks.get(key)?.queueLength ?? 0;
  }

  /** Keys that have had a lock created */
  keys(): K[] {
    return [...this.locks.keys()];
  }

  private lockFor(key: K): AsyncMutex {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new AsyncMutex();
      this.locks.set(key, lock);
    }
    return lock;
  }
}

/**
 * Async mutex keyed by resource name. Waiters on the same name are served
 * in arrival order; different names never wait on each other.
 */
export class Mutex {
  private tails = new Map<string, Promise<void>>();
  private pending = new Map<string, number>();

  constructor(private defaultTimeout = 30000) {}

  /**
   * Acquire the lock for `resourceName`.
   * @returns release function; calling it more than once is harmless
   */
  async acquire(resourceName: string, timeout: number = this.defaultTimeout): Promise<() => void> {
    const previous = this.tails.get(resourceName) ?? Promise.resolve();

    let releaseLock: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    this.tails.set(resourceName, previous.then(() => current));
    this.pending.set(resourceName, (this.pending.get(resourceName) ?? 0) + 1);

    let released = false;
    const release = () => {
      if (released) return;
      released = true;
      releaseLock();
      const remaining = (this.pending.get(resourceName) ?? 1) - 1;
      if (remaining <= 0) {
        this.pending.delete(resourceName);
        this.tails.delete(resourceName);
      } else {
        this.pending.set(resourceName, remaining);
      }
    };

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>(resolve => {
      timer = setTimeout(() => resolve('timeout'), timeout);
    });
    const outcome = await Promise.race([previous.then(() => 'acquired' as const), timedOut]);
    clearTimeout(timer);

    if (outcome === 'timeout') {
      // Keep our place in the chain so later waiters still queue behind the holder
      void previous.then(release);
      throw new Error(`Mutex timeout after ${timeout}ms waiting for lock: ${resourceName}`);
    }
    return release;
  }

  async withLock<T>(resourceName: string, fn: () => Promise<T> | T, timeout?: number): Promise<T> {
    const release = await this.acquire(resourceName, timeout);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(resourceName: string): boolean {
    return this.pending.has(resourceName);
  }

  getActiveLockCount(): number {
    return this.pending.size;
  }

  getLockedResources(): string[] {
    return Array.from(this.pending.keys());
  }
}

// @author lockerdb contributors
// @date 2026-10-19
/**
 * FIFO async mutex for critical sections that span several awaits.
 */
export class Mutex {
  private held = false;
  private queue: (() => void)[] = [];

  /**
   * Waits for the mutex and takes it. Waiters are served in arrival order.
   *
   * @returns The release function; call it exactly once.
   */
  async lock(): Promise<() => void> {
    return new Promise((grant) => {
      const acquire = () => {
        this.held = true;
        grant(() => this.release());
      };
      if (this.held) this.queue.push(acquire);
      else acquire();
    });
  }

  private release(): void {
    this.held = false;
    this.queue.shift()?.();
  }

  /**
   * Runs `fn` with exclusive access and releases the lock afterwards, also when `fn` throws.
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.lock();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.held;
  }

  hasWaiters(): boolean {
    return this.queue.length > 0;
  }
}

/**
 * One mutex per key, created on demand and forgotten once nobody holds or waits for it.
 * The record store keys it by collection data path.
 */
export class KeyedMutex {
  private mutexes: Map<string, Mutex> = new Map();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let mutex = this.mutexes.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.mutexes.set(key, mutex);
    }

    try {
      return await mutex.runExclusive(fn);
    } finally {
      if (!mutex.isLocked() && !mutex.hasWaiters()) this.mutexes.delete(key);
    }
  }

  /** Number of keys currently tracked. */
  get size(): number {
    return this.mutexes.size;
  }
}

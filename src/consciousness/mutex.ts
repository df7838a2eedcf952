/**
 * Mutex — a single FIFO lock for async callers
 *
 * Waiters queue as promises; nobody spins. Release hands the lock
 * directly to the next waiter in arrival order.
 */

type Release = () => void;

export class Mutex {
  private locked = false;
  private waiters: Array<(release: Release) => void> = [];

  /**
   * Wait for the lock. The returned function releases it; calling it
   * more than once has no further effect.
   */
  acquire(): Promise<Release> {
    return new Promise(resolve => {
      if (!this.locked) {
        this.locked = true;
        resolve(this.createRelease());
      } else {
        this.waiters.push(resolve);
      }
    });
  }

  /**
   * Run fn while holding the lock. The lock is released however fn exits.
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  /** Callers currently waiting for the lock */
  get pending(): number {
    return this.waiters.length;
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        next(this.createRelease());
      } else {
        this.locked = false;
      }
    };
  }
}

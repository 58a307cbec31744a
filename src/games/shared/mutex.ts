/**
 * Async mutual-exclusion lock
 *
 * Waiters are served in FIFO order. Releasing hands the lock straight to
 * the next waiter, so nobody can barge in between.
 */

export type Release = () => void;

export class Mutex {
  private locked = false;
  private waiters: Array<(release: Release) => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  /** Number of callers queued behind the current holder */
  get pending(): number {
    return this.waiters.length;
  }

  acquire(): Promise<Release> {
    return new Promise(resolve => {
      if (!this.locked) {
        this.locked = true;
        resolve(this.createRelease());
        return;
      }
      this.waiters.push(resolve);
    });
  }

  /**
   * Run `fn` while holding the lock. The lock is released even if `fn`
   * throws or rejects.
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) {
        throw new Error('Mutex released twice');
      }
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

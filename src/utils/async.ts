/**
 * Async Utility Functions
 *
 * @module
 */

// =============================================================================
// Mutex
// =============================================================================

/**
 * A simple async mutex for serializing access to a shared resource.
 * Uses a FIFO queue so waiters are served in order.
 */
export class Mutex {
  private _locked = false;
  private _waiters: Array<() => void> = [];

  /** Acquires the mutex, waiting if it's currently held. */
  async acquire(): Promise<void> {
    if (!this._locked) {
      this._locked = true;
      return;
    }
    return new Promise<void>((resolve) => {
      this._waiters.push(resolve);
    });
  }

  /** Releases the mutex, waking the next waiter if any. */
  release(): void {
    const next = this._waiters.shift();
    if (next) {
      next();
    } else {
      this._locked = false;
    }
  }

  /** Runs a function while holding the mutex, releasing on completion. */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

/**
 * @module semaphore
 * Async counting semaphore. The knowledge store uses a single permit to keep
 * one writer at a time.
 */

export class Semaphore {
  private current = 0;
  private readonly waiters: Array<() => void> = [];
  private readonly max: number;

  constructor(max: number) {
    if (max < 1) throw new Error('Semaphore max must be >= 1');
    this.max = max;
  }

  async acquire(): Promise<void> {
    if (this.current < this.max) {
      this.current++;
      return;
    }
    return new Promise<void>(resolve => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else if (this.current > 0) {
      this.current--;
    }
  }

  /** Run `task` while holding a permit. */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}

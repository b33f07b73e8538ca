/**
 * @file mutex.ts
 * @description Promise-based mutual exclusion for read-modify-write sequences
 */

/**
 * @class Mutex
 * @description Runs async work one caller at a time, in arrival order
 */
export class Mutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  public async runExclusive<T>(func: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await func();
    } finally {
      this.release();
    }
  }

  public get isLocked(): boolean {
    return this.locked;
  }

  private async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }
    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Ownership passes straight to the next waiter; the lock stays held.
      next();
      return;
    }
    this.locked = false;
  }
}

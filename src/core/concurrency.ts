/**
 * Counting semaphore with FIFO hand-off. A released permit goes straight to the
 * longest waiter, so callers cannot starve each other.
 */
export class Semaphore {
  private availablePermits: number;
  private readonly waiting: Array<() => void> = [];

  constructor(permits: number) {
    this.availablePermits = Math.max(1, Math.trunc(permits));
  }

  async acquire(): Promise<void> {
    if (this.availablePermits > 0) {
      this.availablePermits -= 1;
      return;
    }
    await new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
      return;
    }
    this.availablePermits += 1;
  }

  async runExclusive<T>(operation: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await operation();
    } finally {
      this.release();
    }
  }

  getAvailable(): number {
    return this.availablePermits;
  }

  getWaiting(): number {
    return this.waiting.length;
  }
}

export class Mutex extends Semaphore {
  constructor() {
    super(1);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

import { sleep as defaultSleep } from "./concurrency";

// absorbs float drift in the refill arithmetic
const TOKEN_EPSILON = 1e-9;

export interface RateLimiterOptions {
  /** Tokens available per period; also the burst size. */
  maxRequests: number;
  periodMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  /** Called each time a caller has to wait for a token. */
  onWait?: (waitMs: number) => void;
}

/**
 * Process-wide token bucket. Tokens refill continuously at
 * `maxRequests / periodMs`; waiters are served in arrival order.
 */
export class TokenBucketRateLimiter {
  private readonly capacity: number;
  private readonly refillPerMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly onWait?: (waitMs: number) => void;
  private tokens: number;
  private lastRefill: number;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions) {
    this.capacity = Math.max(1, options.maxRequests);
    this.refillPerMs = this.capacity / Math.max(1, options.periodMs);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.onWait = options.onWait;
    this.tokens = this.capacity;
    this.lastRefill = this.now();
  }

  acquire(): Promise<void> {
    const turn = this.tail.then(() => this.takeToken());
    // keep the chain alive even if a sleep implementation rejects
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  availableTokens(): number {
    this.refill();
    return this.tokens;
  }

  private async takeToken(): Promise<void> {
    this.refill();
    while (this.tokens < 1 - TOKEN_EPSILON) {
      const waitMs = Math.max(1, Math.ceil((1 - this.tokens) / this.refillPerMs));
      this.onWait?.(waitMs);
      await this.sleep(waitMs);
      this.refill();
    }
    this.tokens -= 1;
  }

  private refill(): void {
    const current = this.now();
    const elapsed = current - this.lastRefill;
    if (elapsed <= 0) {
      return;
    }
    this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.refillPerMs);
    this.lastRefill = current;
  }
}

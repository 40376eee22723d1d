import { createLogger } from '../utils/logger.js';

/**
 * Rough token count at four characters per token.
 */
export function estimateTokens(text: string): number {
  return Math.floor(text.length / 4);
}

/**
 * Time source for the controller. Injected so tests can drive refills
 * without real waiting.
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Continuously refilling bucket holding a per-minute budget.
 *
 * Not safe on its own under concurrency; RateBudgetController serializes
 * every refill and debit.
 */
export class TokenBucket {
  readonly capacity: number;
  readonly refillPerMs: number;
  private available: number;
  private lastRefill: number;

  constructor(capacityPerMinute: number, now: number) {
    this.capacity = capacityPerMinute;
    this.refillPerMs = capacityPerMinute / 60_000;
    this.available = capacityPerMinute;
    this.lastRefill = now;
  }

  refill(now: number): void {
    const elapsed = Math.max(0, now - this.lastRefill);
    this.available = Math.min(this.capacity, this.available + elapsed * this.refillPerMs);
    this.lastRefill = now;
  }

  /** Costs above capacity are charged as the full capacity. */
  cap(amount: number): number {
    return Math.min(Math.max(0, amount), this.capacity);
  }

  hasCapacity(amount: number): boolean {
    return this.available >= this.cap(amount);
  }

  /** Milliseconds until `amount` will be available at the refill rate. */
  waitFor(amount: number): number {
    const deficit = this.cap(amount) - this.available;
    return deficit <= 0 ? 0 : Math.ceil(deficit / this.refillPerMs);
  }

  debit(amount: number): void {
    this.available -= this.cap(amount);
  }

  get level(): number {
    return this.available;
  }
}

export interface RateBudgetOptions {
  requestsPerMinute: number;
  tokensPerMinute: number;
  clock?: Clock;
  /** Floor for a single wait, so near-misses do not spin. */
  minWaitMs?: number;
}

export interface RateBudgetSnapshot {
  requestsAvailable: number;
  tokensAvailable: number;
  requestCapacity: number;
  tokenCapacity: number;
}

/**
 * Rate Budget Controller
 *
 * Dual-dimension admission control (requests and tokens per minute) shared
 * by every caller in the process. `reserve()` suspends only the calling
 * task until both buckets can pay, then debits both in the same critical
 * section. Reservations are granted in arrival order.
 */
export class RateBudgetController {
  private readonly requests: TokenBucket;
  private readonly tokens: TokenBucket;
  private readonly clock: Clock;
  private readonly minWaitMs: number;
  private readonly logger = createLogger('RateBudgetController');
  private mutex: Promise<void> = Promise.resolve();

  constructor(options: RateBudgetOptions) {
    this.clock = options.clock ?? systemClock;
    this.minWaitMs = options.minWaitMs ?? 100;
    const now = this.clock.now();
    this.requests = new TokenBucket(options.requestsPerMinute, now);
    this.tokens = new TokenBucket(options.tokensPerMinute, now);
  }

  /**
   * Wait for and debit `requestCost` requests and `tokenCost` tokens.
   *
   * Never throws. Resolves with the milliseconds spent waiting.
   */
  reserve(requestCost: number = 1, tokenCost: number = 0): Promise<number> {
    const reservation = this.mutex.then(() => this.acquire(requestCost, tokenCost));
    // Chain stays alive even if a waiter is abandoned
    this.mutex = reservation.then(
      () => undefined,
      () => undefined
    );
    return reservation;
  }

  private async acquire(requestCost: number, tokenCost: number): Promise<number> {
    const started = this.clock.now();

    for (;;) {
      const now = this.clock.now();
      this.requests.refill(now);
      this.tokens.refill(now);

      if (this.requests.hasCapacity(requestCost) && this.tokens.hasCapacity(tokenCost)) {
        this.requests.debit(requestCost);
        this.tokens.debit(tokenCost);
        return this.clock.now() - started;
      }

      const wait = Math.max(this.minWaitMs, this.requests.waitFor(requestCost), this.tokens.waitFor(tokenCost));
      this.logger.debug('Rate budget exhausted, waiting', {
        waitMs: wait,
        requestCost,
        tokenCost: this.tokens.cap(tokenCost),
        requestsAvailable: Math.floor(this.requests.level),
        tokensAvailable: Math.floor(this.tokens.level),
      });
      await this.clock.sleep(wait);
    }
  }

  snapshot(): RateBudgetSnapshot {
    const now = this.clock.now();
    this.requests.refill(now);
    this.tokens.refill(now);
    return {
      requestsAvailable: this.requests.level,
      tokensAvailable: this.tokens.level,
      requestCapacity: this.requests.capacity,
      tokenCapacity: this.tokens.capacity,
    };
  }
}

import type { ExtractionError } from '../errors.js';
import { fromProviderError, TransientCapabilityError } from '../errors.js';
import { createLogger } from '../utils/logger.js';

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: ExtractionError; attempts: number };

export interface RetryPolicyOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  /** Added to the backoff when the failure was a rate-limit response. */
  rateLimitPenaltyMs?: number;
  /** Upper bound for a single wait. */
  maxDelayMs?: number;
  provider?: string;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/**
 * Retry Policy
 *
 * Bounded exponential backoff with jitter around one capability call.
 * Failures come back as a value so the caller decides whether a failure is
 * fatal (required calls) or absorbable (per-chunk calls).
 *
 * Only TransientCapabilityError is retried. Waits after attempt n are
 * `base * 2^n + jitter(0..1s)`, plus the penalty on rate limits, or the
 * server's Retry-After when that is longer.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly rateLimitPenaltyMs: number;
  private readonly maxDelayMs: number;
  private readonly provider: string;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly logger = createLogger('RetryPolicy');

  constructor(options: RetryPolicyOptions = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 5);
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.rateLimitPenaltyMs = options.rateLimitPenaltyMs ?? 5000;
    this.maxDelayMs = options.maxDelayMs ?? 60_000;
    this.provider = options.provider ?? 'capability';
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.random = options.random ?? Math.random;
  }

  delayFor(attempt: number, error: ExtractionError): number {
    let delay = this.baseDelayMs * Math.pow(2, attempt) + this.random() * 1000;

    if (error instanceof TransientCapabilityError && error.rateLimited) {
      delay += this.rateLimitPenaltyMs;
      if (error.retryAfterMs !== undefined) {
        delay = Math.max(delay, error.retryAfterMs);
      }
    }

    return Math.min(delay, this.maxDelayMs);
  }

  async execute<T>(fn: () => Promise<T>, label: string = 'call'): Promise<RetryResult<T>> {
    let attempt = 0;

    for (;;) {
      attempt++;
      try {
        const value = await fn();
        if (attempt > 1) {
          this.logger.info(`${label} succeeded after retry`, { attempts: attempt });
        }
        return { ok: true, value, attempts: attempt };
      } catch (raw) {
        const error = fromProviderError(raw, this.provider);

        if (!error.isRetryable || attempt >= this.maxAttempts) {
          this.logger.warn(`${label} failed`, {
            attempts: attempt,
            category: error.category,
            retryable: error.isRetryable,
            error: error.message,
          });
          return { ok: false, error, attempts: attempt };
        }

        const waitMs = this.delayFor(attempt, error);
        this.logger.info(`${label} failed, retrying`, {
          attempt,
          maxAttempts: this.maxAttempts,
          category: error.category,
          waitSeconds: (waitMs / 1000).toFixed(1),
        });
        await this.sleep(waitMs);
      }
    }
  }
}

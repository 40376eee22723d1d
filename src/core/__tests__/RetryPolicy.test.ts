import { describe, expect, it } from 'vitest';
import { ExtractionError, TransientCapabilityError } from '../../errors.js';
import { RetryPolicy } from '../RetryPolicy.js';

function policy(maxAttempts = 5) {
  const sleeps: number[] = [];
  const retry = new RetryPolicy({
    maxAttempts,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    random: () => 0,
  });
  return { retry, sleeps };
}

function failing<T>(failures: unknown[], value: T): () => Promise<T> {
  let calls = 0;
  return async () => {
    const failure = failures[calls++];
    if (failure !== undefined) throw failure;
    return value;
  };
}

describe('RetryPolicy', () => {
  it('returns the first success without waiting', async () => {
    const { retry, sleeps } = policy();
    await expect(retry.execute(async () => 'ok')).resolves.toEqual({ ok: true, value: 'ok', attempts: 1 });
    expect(sleeps).toEqual([]);
  });

  it('backs off exponentially on transient failures', async () => {
    const { retry, sleeps } = policy();
    const fn = failing([new TransientCapabilityError('flaky'), new TransientCapabilityError('flaky')], 'ok');

    await expect(retry.execute(fn)).resolves.toEqual({ ok: true, value: 'ok', attempts: 3 });
    expect(sleeps).toEqual([2000, 4000]);
  });

  it('stops at the first non-retryable failure', async () => {
    const { retry, sleeps } = policy();
    const result = await retry.execute(failing([new Error('bad request')], 'never'));

    expect(result.ok).toBe(false);
    expect(result.attempts).toBe(1);
    if (!result.ok) {
      expect(result.error.category).toBe('unknown');
      expect(result.error.message).toBe('bad request');
    }
    expect(sleeps).toEqual([]);
  });

  it('gives up after maxAttempts', async () => {
    const { retry, sleeps } = policy(3);
    const flaky = new TransientCapabilityError('still down');
    const result = await retry.execute(failing([flaky, flaky, flaky, flaky], 'never'));

    expect(result).toEqual({ ok: false, error: flaky, attempts: 3 });
    expect(sleeps).toEqual([2000, 4000]);
  });

  it('maps SDK status codes before deciding', async () => {
    const { retry, sleeps } = policy();
    const tooMany = Object.assign(new Error('Too many requests'), { status: 429 });
    const result = await retry.execute(failing([tooMany], 'ok'));

    expect(result).toEqual({ ok: true, value: 'ok', attempts: 2 });
    expect(sleeps).toEqual([7000]);
  });

  describe('delayFor', () => {
    const { retry } = policy();

    it('adds the rate-limit penalty', () => {
      expect(retry.delayFor(1, new TransientCapabilityError('429', { rateLimited: true }))).toBe(7000);
    });

    it('honours a longer Retry-After', () => {
      expect(retry.delayFor(1, new TransientCapabilityError('429', { rateLimited: true, retryAfterMs: 30_000 }))).toBe(30_000);
    });

    it('caps every wait', () => {
      expect(retry.delayFor(1, new TransientCapabilityError('429', { rateLimited: true, retryAfterMs: 120_000 }))).toBe(60_000);
      expect(retry.delayFor(10, new ExtractionError('down', 'network', { isRetryable: true }))).toBe(60_000);
    });
  });
});

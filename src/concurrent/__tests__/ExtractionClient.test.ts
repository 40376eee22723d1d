import OpenAI from 'openai';
import { describe, expect, it } from 'vitest';
import { FakeCapability } from '../../__tests__/helpers.js';
import { RateBudgetController, type Clock } from '../../core/RateBudgetController.js';
import { RetryPolicy } from '../../core/RetryPolicy.js';
import { CapabilityUnavailableError } from '../../errors.js';
import { ExtractionClient } from '../ExtractionClient.js';

const frozenClock: Clock = {
  now: () => 0,
  sleep: async () => {},
};

function clientFor(capability: FakeCapability, maxAttempts: number) {
  const rateBudget = new RateBudgetController({ requestsPerMinute: 100, tokensPerMinute: 10_000, clock: frozenClock });
  const retryPolicy = new RetryPolicy({ maxAttempts, sleep: async () => {}, random: () => 0 });
  return { client: new ExtractionClient(capability, rateBudget, retryPolicy), rateBudget };
}

describe('ExtractionClient', () => {
  it('reserves the prompt estimate plus the response allowance', async () => {
    const capability = new FakeCapability(() => '{"ok": true}');
    const { client, rateBudget } = clientFor(capability, 1);

    const result = await client.call('x'.repeat(400), { label: 'chunk 1', responseTokens: 50 });

    expect(result).toEqual({ ok: true, value: '{"ok": true}', attempts: 1 });
    expect(rateBudget.snapshot().tokensAvailable).toBe(9850);
    expect(rateBudget.snapshot().requestsAvailable).toBe(99);
  });

  it('reserves again for every retry', async () => {
    const capability = new FakeCapability(() => {
      throw Object.assign(new Error('Service unavailable'), { status: 503 });
    });
    const { client, rateBudget } = clientFor(capability, 2);

    const result = await client.call('x'.repeat(400), { label: 'chunk 1', responseTokens: 50 });

    expect(result.ok).toBe(false);
    expect(capability.calls).toBe(2);
    expect(rateBudget.snapshot().tokensAvailable).toBe(9700);
    expect(rateBudget.snapshot().requestsAvailable).toBe(98);
  });

  it('retries a dropped connection up to the attempt limit', async () => {
    const capability = new FakeCapability(() => {
      throw new OpenAI.APIConnectionError({});
    });
    const { client } = clientFor(capability, 5);

    const result = await client.call('prompt', { label: 'chunk 1', responseTokens: 50 });

    expect(capability.calls).toBe(5);
    expect(result).toMatchObject({ ok: false, attempts: 5 });
  });

  it('throws CapabilityUnavailableError from a required call', async () => {
    const capability = new FakeCapability(() => {
      throw Object.assign(new Error('Service unavailable'), { status: 503 });
    });
    const { client } = clientFor(capability, 2);

    const failure = client.callRequired('prompt', { label: 'final structuring' });

    await expect(failure).rejects.toBeInstanceOf(CapabilityUnavailableError);
    await expect(failure).rejects.toMatchObject({ stage: 'final structuring', attempts: 2, category: 'unavailable' });
  });
});

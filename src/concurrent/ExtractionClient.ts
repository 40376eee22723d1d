import { CapabilityUnavailableError } from '../errors.js';
import { estimateTokens, type RateBudgetController } from '../core/RateBudgetController.js';
import type { RetryPolicy, RetryResult } from '../core/RetryPolicy.js';
import type { ExtractionCapability } from '../core/providers/ExtractionCapability.js';

export interface ExtractionCallOptions {
  /** Used in log lines and in CapabilityUnavailableError. */
  label: string;
  /** Tokens reserved on top of the prompt estimate for the response. */
  responseTokens?: number;
}

/**
 * Extraction Client
 *
 * Every capability call in the pipeline goes through here: each attempt
 * first reserves rate budget (one request plus the prompt's estimated
 * tokens and the response allowance), then calls the capability, with the
 * whole attempt wrapped in the retry policy.
 */
export class ExtractionClient {
  readonly capability: ExtractionCapability;
  private rateBudget: RateBudgetController;
  private retryPolicy: RetryPolicy;

  constructor(capability: ExtractionCapability, rateBudget: RateBudgetController, retryPolicy: RetryPolicy) {
    this.capability = capability;
    this.rateBudget = rateBudget;
    this.retryPolicy = retryPolicy;
  }

  /**
   * Call the capability; failures come back as a value.
   */
  call(prompt: string, options: ExtractionCallOptions): Promise<RetryResult<string>> {
    const tokenCost = estimateTokens(prompt) + (options.responseTokens ?? 0);

    return this.retryPolicy.execute(async () => {
      await this.rateBudget.reserve(1, tokenCost);
      return this.capability.call(prompt);
    }, options.label);
  }

  /**
   * Call the capability for a step the run cannot continue without.
   *
   * @throws CapabilityUnavailableError once retries are exhausted
   */
  async callRequired(prompt: string, options: ExtractionCallOptions): Promise<string> {
    const result = await this.call(prompt, options);
    if (!result.ok) {
      throw new CapabilityUnavailableError(options.label, result.attempts, result.error);
    }
    return result.value;
  }
}

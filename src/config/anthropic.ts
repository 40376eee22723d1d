import Anthropic from '@anthropic-ai/sdk';
import dotenv from 'dotenv';
import { ConfigurationError } from '../errors.js';
import { logger } from '../utils/logger.js';

dotenv.config();

/**
 * Anthropic Configuration
 *
 * Connection to the Anthropic Messages API, used when
 * EXTRACTION_PROVIDER=anthropic.
 */
export class AnthropicConfig {
  private static client: Anthropic | null = null;

  static getConfig() {
    const apiKey = process.env.ANTHROPIC_API_KEY;
    const model = process.env.ANTHROPIC_MODEL || 'claude-3-5-sonnet-20241022';

    if (!apiKey) {
      throw new ConfigurationError(
        'Missing required Anthropic configuration. ' +
          'Please ensure ANTHROPIC_API_KEY is set in .env'
      );
    }

    return {
      apiKey,
      model,
    };
  }

  /**
   * Reset cached client (useful when environment variables change)
   */
  static resetClient(): void {
    dotenv.config({ override: true });
    this.client = null;
  }

  static getClient(): Anthropic {
    if (!this.client) {
      const config = this.getConfig();

      this.client = new Anthropic({
        apiKey: config.apiKey,
        timeout: 600000, // 10 minutes
        maxRetries: 0,
      });

      logger.info('Anthropic client initialized', { model: config.model });
    }

    return this.client;
  }

  static getModel(): string {
    return this.getConfig().model;
  }

  static validate(): boolean {
    try {
      this.getConfig();
      return true;
    } catch (error) {
      logger.error('Anthropic configuration invalid', { error: error instanceof Error ? error.message : String(error) });
      return false;
    }
  }
}

import OpenAI from 'openai';
import dotenv from 'dotenv';
import { ConfigurationError } from '../errors.js';
import { logger } from '../utils/logger.js';

dotenv.config();

/**
 * OpenAI Configuration
 *
 * Connection to any OpenAI-compatible chat completions endpoint. Setting
 * OPENAI_BASE_URL points the same client at a compatible host (Groq,
 * a local gateway); leaving it unset targets api.openai.com.
 */
export class OpenAIConfig {
  private static client: OpenAI | null = null;

  /**
   * Get required environment variables
   */
  static getConfig() {
    const apiKey = process.env.OPENAI_API_KEY;
    const baseURL = process.env.OPENAI_BASE_URL || undefined;
    const organization = process.env.OPENAI_ORG_ID || undefined;
    const model = process.env.OPENAI_MODEL || 'gpt-4o-mini';

    if (!apiKey) {
      throw new ConfigurationError(
        'Missing required OpenAI configuration. ' +
          'Please ensure OPENAI_API_KEY is set in .env'
      );
    }

    return {
      apiKey,
      baseURL,
      organization,
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

  /**
   * Get or create OpenAI client
   */
  static getClient(): OpenAI {
    if (!this.client) {
      const config = this.getConfig();

      this.client = new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL,
        organization: config.organization,
        // Retries are owned by RetryPolicy
        maxRetries: 0,
      });

      logger.info('OpenAI client initialized', {
        model: config.model,
        baseURL: config.baseURL ?? 'default',
      });
    }

    return this.client;
  }

  /**
   * Get the default model name
   */
  static getModel(): string {
    return this.getConfig().model;
  }

  /**
   * Validate OpenAI configuration without creating client
   */
  static validate(): boolean {
    try {
      this.getConfig();
      return true;
    } catch (error) {
      logger.error('OpenAI configuration invalid', { error: error instanceof Error ? error.message : String(error) });
      return false;
    }
  }
}

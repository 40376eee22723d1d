import { AnthropicConfig } from '../../config/anthropic.js';
import { OpenAIConfig } from '../../config/openai.js';
import type { ExtractionProvider } from '../../config/pipeline.js';
import { logger } from '../../utils/logger.js';
import { ClaudeCapability } from './ClaudeCapability.js';
import type { CapabilityCallSettings, ExtractionCapability } from './ExtractionCapability.js';
import { OpenAICapability } from './OpenAICapability.js';

/**
 * Capability Factory
 *
 * Creates the extraction capability selected by EXTRACTION_PROVIDER.
 */
export class CapabilityFactory {
  static createCapability(provider: ExtractionProvider, settings: CapabilityCallSettings = {}): ExtractionCapability {
    switch (provider) {
      case 'openai':
        logger.info('Using OpenAI-compatible chat completions for extraction');
        return new OpenAICapability(settings);

      case 'anthropic':
        logger.info('Using Anthropic Messages API for extraction');
        return new ClaudeCapability(settings);
    }
  }

  /**
   * Check that the provider's credentials are present without calling it
   */
  static validateProvider(provider: ExtractionProvider): boolean {
    return provider === 'openai' ? OpenAIConfig.validate() : AnthropicConfig.validate();
  }
}

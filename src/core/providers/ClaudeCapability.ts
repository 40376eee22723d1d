import type Anthropic from '@anthropic-ai/sdk';
import { AnthropicConfig } from '../../config/anthropic.js';
import { createLogger } from '../../utils/logger.js';
import {
  DEFAULT_CALL_SETTINGS,
  EXTRACTION_SYSTEM_PROMPT,
  type CapabilityCallSettings,
  type ExtractionCapability,
} from './ExtractionCapability.js';

/**
 * Claude Capability
 *
 * Anthropic Messages API. Claude has no JSON-object mode, so the system
 * prompt carries the output contract.
 */
export class ClaudeCapability implements ExtractionCapability {
  readonly name = 'anthropic';
  private client: Anthropic;
  private model: string;
  private settings: CapabilityCallSettings;
  private logger = createLogger('ClaudeCapability');

  constructor(settings: CapabilityCallSettings = {}, client: Anthropic = AnthropicConfig.getClient()) {
    this.client = client;
    this.model = settings.model || AnthropicConfig.getModel();
    this.settings = settings;
  }

  async call(prompt: string): Promise<string> {
    // SDK refuses non-streaming requests it estimates to run past 10 minutes
    const maxTokens = Math.min(this.settings.maxOutputTokens ?? DEFAULT_CALL_SETTINGS.maxOutputTokens, 20000);

    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: maxTokens,
      temperature: this.settings.temperature ?? DEFAULT_CALL_SETTINGS.temperature,
      system: `${EXTRACTION_SYSTEM_PROMPT}\n\nRespond with the JSON object only. No markdown, no code blocks, no explanations.`,
      messages: [{ role: 'user', content: prompt }],
    });

    if (response.stop_reason === 'max_tokens') {
      this.logger.warn('Response truncated at max_tokens', { model: this.model });
    }

    let content = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        content += block.text;
      }
    }

    this.logger.debug('Message received', {
      model: this.model,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    });

    return content;
  }
}

import type OpenAI from 'openai';
import { OpenAIConfig } from '../../config/openai.js';
import { createLogger } from '../../utils/logger.js';
import {
  DEFAULT_CALL_SETTINGS,
  EXTRACTION_SYSTEM_PROMPT,
  type CapabilityCallSettings,
  type ExtractionCapability,
} from './ExtractionCapability.js';

/**
 * OpenAI Capability
 *
 * Chat Completions in JSON-object mode. Works against any OpenAI-compatible
 * endpoint configured through OPENAI_BASE_URL.
 */
export class OpenAICapability implements ExtractionCapability {
  readonly name = 'openai';
  private client: OpenAI;
  private model: string;
  private settings: CapabilityCallSettings;
  private logger = createLogger('OpenAICapability');

  constructor(settings: CapabilityCallSettings = {}, client: OpenAI = OpenAIConfig.getClient()) {
    this.client = client;
    this.model = settings.model || OpenAIConfig.getModel();
    this.settings = settings;
  }

  async call(prompt: string): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      temperature: this.settings.temperature ?? DEFAULT_CALL_SETTINGS.temperature,
      max_tokens: this.settings.maxOutputTokens ?? DEFAULT_CALL_SETTINGS.maxOutputTokens,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: EXTRACTION_SYSTEM_PROMPT },
        { role: 'user', content: prompt },
      ],
    });

    const choice = response.choices[0];
    if (choice?.finish_reason === 'length') {
      this.logger.warn('Response truncated at max_tokens', { model: this.model });
    }

    this.logger.debug('Completion received', {
      model: this.model,
      promptTokens: response.usage?.prompt_tokens,
      completionTokens: response.usage?.completion_tokens,
    });

    return choice?.message.content ?? '';
  }
}

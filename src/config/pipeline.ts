import dotenv from 'dotenv';
import { ConfigurationError } from '../errors.js';

dotenv.config();

export type ExtractionProvider = 'openai' | 'anthropic';

/**
 * Tunables for one pipeline process.
 *
 * Rate limits are per-minute budgets; sizes are characters unless the name
 * says tokens.
 */
export interface PipelineSettings {
  provider: ExtractionProvider;
  requestsPerMinute: number;
  tokensPerMinute: number;
  singlePassTokenLimit: number;
  contextTokenBudget: number;
  chunkSizeChars: number;
  fanOutConcurrency: number;
  mergeContextMaxChars: number;
  gapFillDocChars: number;
  retryMaxAttempts: number;
  retryBaseDelayMs: number;
  rateLimitPenaltyMs: number;
}

export const DEFAULT_PIPELINE_SETTINGS: Readonly<PipelineSettings> = Object.freeze({
  provider: 'openai',
  requestsPerMinute: 3000,
  tokensPerMinute: 1_000_000,
  singlePassTokenLimit: 40_000,
  contextTokenBudget: 15_000,
  chunkSizeChars: 8000,
  fanOutConcurrency: 20,
  mergeContextMaxChars: 120_000,
  gapFillDocChars: 15_000,
  retryMaxAttempts: 5,
  retryBaseDelayMs: 1000,
  rateLimitPenaltyMs: 5000,
});

const NUMERIC_ENV: ReadonlyArray<[keyof PipelineSettings, string]> = [
  ['requestsPerMinute', 'RATE_LIMIT_RPM'],
  ['tokensPerMinute', 'RATE_LIMIT_TPM'],
  ['singlePassTokenLimit', 'SINGLE_PASS_TOKEN_LIMIT'],
  ['contextTokenBudget', 'CONTEXT_TOKEN_BUDGET'],
  ['chunkSizeChars', 'CHUNK_SIZE_CHARS'],
  ['fanOutConcurrency', 'FANOUT_CONCURRENCY'],
  ['mergeContextMaxChars', 'MERGE_CONTEXT_MAX_CHARS'],
  ['gapFillDocChars', 'GAP_FILL_DOC_CHARS'],
  ['retryMaxAttempts', 'RETRY_MAX_ATTEMPTS'],
  ['retryBaseDelayMs', 'RETRY_BASE_DELAY_MS'],
  ['rateLimitPenaltyMs', 'RATE_LIMIT_PENALTY_MS'],
];

function parsePositiveInt(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}"`, { name, raw });
  }
  return value;
}

function parseProvider(raw: string | undefined): ExtractionProvider {
  if (raw === undefined || raw === '') return DEFAULT_PIPELINE_SETTINGS.provider;
  if (raw === 'openai' || raw === 'anthropic') return raw;
  throw new ConfigurationError(`EXTRACTION_PROVIDER must be "openai" or "anthropic", got "${raw}"`);
}

/**
 * Pipeline Configuration
 *
 * Reads PipelineSettings from the environment (.env via dotenv), falling
 * back to DEFAULT_PIPELINE_SETTINGS for anything unset.
 */
export class PipelineConfig {
  static load(env: NodeJS.ProcessEnv = process.env): PipelineSettings {
    const settings: PipelineSettings = {
      ...DEFAULT_PIPELINE_SETTINGS,
      provider: parseProvider(env.EXTRACTION_PROVIDER),
    };

    for (const [key, envName] of NUMERIC_ENV) {
      const raw = env[envName];
      if (raw !== undefined && raw !== '') {
        Object.assign(settings, { [key]: parsePositiveInt(envName, raw) });
      }
    }

    return settings;
  }
}

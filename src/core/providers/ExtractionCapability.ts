/**
 * Extraction Capability Interface
 *
 * The external text-understanding service. Takes a prompt and returns the
 * raw response text; parsing and recovery happen in the pipeline. A call
 * may throw any provider error; RetryPolicy maps it into the error taxonomy.
 */
export interface ExtractionCapability {
  readonly name: string;
  call(prompt: string): Promise<string>;
}

/**
 * System instruction shared by every provider.
 */
export const EXTRACTION_SYSTEM_PROMPT =
  'You are a tender analyst. Output valid JSON only. Escape all newlines and quotes within string values.';

export interface CapabilityCallSettings {
  model?: string;
  maxOutputTokens?: number;
  temperature?: number;
}

export const DEFAULT_CALL_SETTINGS = {
  maxOutputTokens: 6000,
  temperature: 0,
} as const;

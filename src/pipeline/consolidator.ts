import type { ExtractionClient } from '../concurrent/ExtractionClient.js';
import { MalformedExtractionError } from '../errors.js';
import { buildFinalMergePrompt } from '../prompts/hierarchical.js';
import { createLogger } from '../utils/logger.js';
import { parseExtractionResponse } from '../utils/validators.js';
import { preExtractedHeader } from './chunkPlanner.js';
import { canonicalizeRecord, type CanonicalizeResult } from './record.js';
import type { CandidateRecord, PreExtractedFields } from './types.js';

const logger = createLogger('Consolidator');

export const DEFAULT_MERGE_MAX_CHARS = 120_000;

/** Tokens reserved for the structured answer of the final call. */
export const FINAL_RESPONSE_TOKENS = 2000;

export interface MergeContext {
  context: string;
  included: number;
  dropped: number;
}

/**
 * Normalize a micro-summary response: JSON answers are re-serialized
 * compactly, anything else is kept as text.
 */
export function normalizeMicroResult(raw: string): string {
  try {
    return JSON.stringify(parseExtractionResponse(raw));
  } catch (error) {
    if (error instanceof MalformedExtractionError) {
      return raw.trim();
    }
    throw error;
  }
}

/**
 * Assemble the final-call context: the pre-extracted header followed by one
 * `--- CHUNK <n> ---` section per partial result. Sections that would push
 * the context past `maxChars` are left out, and every section after them.
 */
export function mergeMicroResults(
  partials: readonly string[],
  preExtracted: PreExtractedFields,
  options: { maxChars?: number } = {}
): MergeContext {
  const maxChars = options.maxChars ?? DEFAULT_MERGE_MAX_CHARS;
  let context = preExtractedHeader(preExtracted);
  let included = 0;

  for (const [i, partial] of partials.entries()) {
    const section = `${included > 0 ? '\n\n' : ''}--- CHUNK ${i + 1} ---\n${partial}`;
    if (context.length + section.length > maxChars) break;
    context += section;
    included++;
  }

  const dropped = partials.length - included;
  if (dropped > 0) {
    logger.warn(`Merge context full, dropped ${dropped} of ${partials.length} chunk summaries`, { maxChars });
  }

  return { context, included, dropped };
}

/**
 * The final structuring call: one required capability call over the merged
 * context, parsed and forced into the template's shape.
 *
 * @throws CapabilityUnavailableError when the call fails after retries
 * @throws MalformedExtractionError when the answer is not recoverable JSON
 */
export async function finalStructure(
  client: ExtractionClient,
  mergeContext: string,
  template: CandidateRecord
): Promise<CanonicalizeResult> {
  const prompt = buildFinalMergePrompt(mergeContext, JSON.stringify(template, null, 2));
  const raw = await client.callRequired(prompt, {
    label: 'final structuring',
    responseTokens: FINAL_RESPONSE_TOKENS,
  });

  return canonicalizeRecord(parseExtractionResponse(raw), template);
}

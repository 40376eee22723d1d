import { renderPrompt } from './render.js';

/**
 * Hierarchical Extraction Prompts
 *
 * Stage 1 summarizes each chunk; stage 2 merges the summaries into the
 * schema.
 */

export const MICRO_SUMMARY_PROMPT = `You are a tender analyst. Summarize the following document chunk.
Focus on: Eligibility, Financials, Dates, Scope of Work, and Specific Clauses.
Keep it dense and structured. Return a JSON object whose keys name what each value describes.

CHUNK:
{{CHUNK_TEXT}}`;

export const FINAL_MERGE_PROMPT = `You are a tender analyst. Below are micro-summaries of various parts of a tender document along with some pre-extracted structured fields.
Your task is to create a SINGLE, COMPLETE, and ACCURATE JSON summary following the EXACT schema provided.

MICRO-SUMMARIES:
{{MERGE_CONTEXT}}

OUTPUT SCHEMA:
{{SCHEMA_JSON}}

DIRECTIONS:
1. Merge all information into a single coherent summary.
2. If there are conflicting values, prefer the most recent or specific one.
3. If information is missing, use empty strings/lists as per schema.
4. Sections marked as CHUNK ERROR could not be read; do not guess their content.
5. Output ONLY valid JSON.`;

export function buildMicroSummaryPrompt(chunkText: string): string {
  return renderPrompt(MICRO_SUMMARY_PROMPT, { CHUNK_TEXT: chunkText });
}

export function buildFinalMergePrompt(mergeContext: string, schemaJson: string): string {
  return renderPrompt(FINAL_MERGE_PROMPT, {
    MERGE_CONTEXT: mergeContext,
    SCHEMA_JSON: schemaJson,
  });
}

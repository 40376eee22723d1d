import { renderPrompt } from './render.js';

/**
 * Gap Fill Prompt
 *
 * Template variables to replace:
 * - {{FIELD_LIST}}: one `- path` line per missing field
 * - {{DOCUMENT_CONTEXT}}: `--- Doc: <id> ---` sections, each truncated
 */
export const GAP_FILL_PROMPT = `You are a tender analyst. We have some missing fields from a previous extraction pass.
Please search the document text below and extract EXACT values for these specific paths.

MISSING FIELDS:
{{FIELD_LIST}}

DOCUMENT CONTEXT (Truncated):
{{DOCUMENT_CONTEXT}}

INSTRUCTIONS:
1. Search specifically for these fields by path.
2. If found, provide the exact corresponding value.
3. If still not found, use "Not mentioned".
4. Output valid JSON matching the path structure, e.g. {"key_dates": {"bid_end": "..."}}.`;

export function buildGapFillPrompt(paths: readonly string[], documents: ReadonlyArray<{ id: string; text: string }>, maxDocChars: number): string {
  const fieldList = paths.map((path) => `- ${path}`).join('\n');
  const documentContext = documents.map((doc) => `--- Doc: ${doc.id} ---\n${doc.text.slice(0, maxDocChars)}`).join('\n');

  return renderPrompt(GAP_FILL_PROMPT, {
    FIELD_LIST: fieldList,
    DOCUMENT_CONTEXT: documentContext,
  });
}

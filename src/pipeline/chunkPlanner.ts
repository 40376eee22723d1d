import { estimateTokens } from '../core/RateBudgetController.js';
import type { Chunk, PreExtractedFields } from './types.js';

/**
 * Chunk Planner
 *
 * Splits oversized text into line-aligned chunks and builds the condensed
 * single-call context.
 */

/**
 * Split `text` into chunks of at most `maxSize` characters, counting one
 * separator per line. Lines are never split; a single line longer than
 * `maxSize` becomes a chunk of its own. Joining the chunks with "\n"
 * reproduces `text`.
 */
export function splitToChunks(text: string, maxSize: number): Chunk[] {
  const chunks: Chunk[] = [];
  let current: string[] = [];
  let currentSize = 0;

  for (const line of text.split('\n')) {
    if (currentSize + line.length > maxSize && current.length > 0) {
      chunks.push({ index: chunks.length, text: current.join('\n') });
      current = [];
      currentSize = 0;
    }
    current.push(line);
    currentSize += line.length + 1;
  }

  if (current.length > 0) {
    chunks.push({ index: chunks.length, text: current.join('\n') });
  }

  return chunks;
}

/**
 * Trim every line and drop blank ones.
 */
export function filterRelevantLines(text: string): string {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

export type CriticalSectionKey = 'eligibility' | 'financial' | 'timeline' | 'scope_of_work' | 'terms_conditions';

export type CriticalSections = Partial<Record<CriticalSectionKey, string>>;

// Heading line, then everything up to the next numbered heading
const SECTION_PATTERNS: ReadonlyArray<[CriticalSectionKey, RegExp]> = [
  ['eligibility', /(?:Eligibility|Qualification|Who Can Bid).*?\n(.*?)(?=\n\s*\d+\.|$)/is],
  ['financial', /(?:Financial Requirements?|EMD|Tender Fee).*?\n(.*?)(?=\n\s*\d+\.|$)/is],
  ['scope_of_work', /(?:Scope of Work|Technical Specs?).*?\n(.*?)(?=\n\s*\d+\.|$)/is],
  ['terms_conditions', /(?:Terms and Conditions|Special Conditions).*?\n(.*?)(?=\n\s*\d+\.|$)/is],
  ['timeline', /(?:Important Dates?|Timeline|Schedule).*?\n(.*?)(?=\n\s*\d+\.|$)/is],
];

const MAX_SECTION_CHARS = 5000;

/**
 * Locate the sections a condensed context is built from.
 */
export function extractCriticalSections(text: string): CriticalSections {
  const sections: CriticalSections = {};

  for (const [key, pattern] of SECTION_PATTERNS) {
    const match = pattern.exec(text);
    if (match && match[1] !== undefined) {
      sections[key] = match[1].trim().slice(0, MAX_SECTION_CHARS);
    }
  }

  return sections;
}

export const TRUNCATION_MARKER = '\n... [truncated] ...\n';

/** Section order, heading and share of the remaining budget. */
export const SECTION_WEIGHTS: ReadonlyArray<{ key: CriticalSectionKey; title: string; weight: number }> = [
  { key: 'eligibility', title: 'ELIGIBILITY CRITERIA', weight: 0.3 },
  { key: 'financial', title: 'FINANCIAL REQUIREMENTS', weight: 0.25 },
  { key: 'timeline', title: 'KEY DATES & TIMELINE', weight: 0.15 },
  { key: 'scope_of_work', title: 'SCOPE OF WORK', weight: 0.15 },
  { key: 'terms_conditions', title: 'TERMS & CONDITIONS', weight: 0.15 },
];

const RESERVED_TOKENS = 500;
const CHARS_PER_TOKEN = 4;

export function preExtractedHeader(preExtracted: PreExtractedFields): string {
  return `=== PRE-EXTRACTED DATA ===\n${JSON.stringify(preExtracted, null, 2)}\n\n`;
}

/**
 * Keep the head and tail halves of `content` around the truncation marker.
 */
export function truncateMiddle(content: string, limit: number): string {
  if (content.length <= limit) return content;
  const half = Math.max(0, Math.floor(limit / 2));
  return content.slice(0, half) + TRUNCATION_MARKER + content.slice(content.length - half);
}

/**
 * Build the context for a single extraction call.
 *
 * Documents under 90% of the budget are sent whole after the pre-extracted
 * header. Larger ones are represented by their critical sections, each
 * limited to its weighted share of what the header leaves.
 */
export function buildCondensedContext(
  fullText: string,
  preExtracted: PreExtractedFields,
  sections: CriticalSections,
  budget: number
): string {
  const header = preExtractedHeader(preExtracted);

  if (estimateTokens(fullText) < budget * 0.9) {
    return `${header}=== COMPLETE TENDER DOCUMENT ===\n${fullText}\n`;
  }

  const available = budget - estimateTokens(header) - RESERVED_TOKENS;
  let context = header;

  for (const { key, title, weight } of SECTION_WEIGHTS) {
    const content = sections[key];
    if (content === undefined) continue;

    const limit = Math.floor(available * weight * CHARS_PER_TOKEN);
    context += `\n=== ${title} ===\n${truncateMiddle(content, limit)}\n`;
  }

  return context;
}

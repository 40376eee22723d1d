import type { ExtractionClient } from '../concurrent/ExtractionClient.js';
import { buildGapFillPrompt } from '../prompts/gapFill.js';
import { readValidatedDataFile } from '../utils/dataFiles.js';
import { createLogger } from '../utils/logger.js';
import { parseExtractionResponse } from '../utils/validators.js';
import { canonicalizeRecord, isRecordSection, loadTenderTemplate } from './record.js';
import type { SchemaCoercionError } from '../errors.js';
import type { CandidateRecord, GapSummary, MissingFieldRecord, RecordSection, SourceDocument } from './types.js';

const logger = createLogger('GapAnalyzer');

/**
 * Gap Analyzer & Refiller
 *
 * Finds empty leaves in a candidate record and re-asks the capability for
 * the critical ones.
 */

const EMPTY_TOKENS = new Set(['', 'not mentioned', 'n/a', 'not specified', 'not available', 'tbd']);

export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return EMPTY_TOKENS.has(value.trim().toLowerCase());
  if (Array.isArray(value)) return value.every((item) => isEmptyValue(item));
  if (typeof value === 'object') return Object.keys(value).length === 0;
  return false;
}

/** Section name → critical field names; `root` holds top-level fields. */
export type CriticalFieldRegistry = Readonly<Record<string, readonly string[]>>;

const REGISTRY_FILE_SCHEMA = {
  type: 'object',
  additionalProperties: { type: 'array', items: { type: 'string' } },
};

function isRegistry(value: unknown): value is Record<string, string[]> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((fields) => Array.isArray(fields) && fields.every((field) => typeof field === 'string'))
  );
}

let cachedRegistry: CriticalFieldRegistry | null = null;

export function loadCriticalFields(): CriticalFieldRegistry {
  if (!cachedRegistry) {
    const raw = readValidatedDataFile('critical-fields.json', REGISTRY_FILE_SCHEMA, isRegistry);
    const frozen: Record<string, readonly string[]> = {};
    for (const [section, fields] of Object.entries(raw)) {
      frozen[section] = Object.freeze([...fields]);
    }
    cachedRegistry = Object.freeze(frozen);
  }
  return cachedRegistry;
}

export function isCriticalField(section: string, field: string, registry: CriticalFieldRegistry = loadCriticalFields()): boolean {
  return registry[section]?.includes(field) ?? false;
}

/**
 * Every empty leaf of `record`, in tree order. `section` is the leaf's
 * parent key, or `root` for top-level fields.
 */
export function scanForGaps(record: RecordSection, registry: CriticalFieldRegistry = loadCriticalFields()): MissingFieldRecord[] {
  const missing: MissingFieldRecord[] = [];

  const walk = (node: RecordSection, parentKey: string, prefix: string): void => {
    for (const [key, value] of Object.entries(node)) {
      const path = prefix ? `${prefix}.${key}` : key;
      if (isRecordSection(value)) {
        walk(value, key, path);
      } else if (isEmptyValue(value)) {
        const section = parentKey || 'root';
        missing.push({ section, field: key, path, isCritical: isCriticalField(section, key, registry) });
      }
    }
  };

  walk(record, '', '');
  return missing;
}

export function criticalGaps(record: RecordSection, registry: CriticalFieldRegistry = loadCriticalFields()): MissingFieldRecord[] {
  return scanForGaps(record, registry).filter((gap) => gap.isCritical);
}

export function summarizeGaps(record: RecordSection, registry: CriticalFieldRegistry = loadCriticalFields()): GapSummary {
  const missing = scanForGaps(record, registry);
  const bySection: Record<string, number> = {};
  for (const gap of missing) {
    bySection[gap.section] = (bySection[gap.section] ?? 0) + 1;
  }

  return {
    totalMissing: missing.length,
    criticalMissing: missing.filter((gap) => gap.isCritical).length,
    bySection,
  };
}

/**
 * Merge `updates` into `base` without mutating either. Sections merge
 * recursively; any other update replaces the base value only when it is
 * non-empty.
 */
export function deepMerge(base: RecordSection, updates: RecordSection): RecordSection {
  const result: RecordSection = { ...base };

  for (const [key, value] of Object.entries(updates)) {
    const current = result[key];
    if (isRecordSection(value) && isRecordSection(current)) {
      result[key] = deepMerge(current, value);
    } else if (!isEmptyValue(value)) {
      result[key] = value;
    }
  }

  return result;
}

export interface RefillOptions {
  /** Characters of each document included in the prompt. */
  maxDocChars?: number;
  template?: CandidateRecord;
}

export interface RefillResult {
  record: CandidateRecord;
  coercions: SchemaCoercionError[];
}

export const DEFAULT_GAP_FILL_DOC_CHARS = 15_000;

/** Tokens reserved for the refill answer. */
export const REFILL_RESPONSE_TOKENS = 1000;

/**
 * Ask the capability for the `gaps` paths only and merge what comes back.
 *
 * The answer is coerced to the template and only its non-empty leaves are
 * merged, so the record keeps its own shape. With no gaps the record is
 * returned as it is and nothing is called.
 *
 * @throws CapabilityUnavailableError when the call fails after retries
 * @throws MalformedExtractionError when the answer is not recoverable JSON
 */
export async function refill(
  client: ExtractionClient,
  record: CandidateRecord,
  gaps: readonly MissingFieldRecord[],
  documents: readonly SourceDocument[],
  options: RefillOptions = {}
): Promise<RefillResult> {
  if (gaps.length === 0) {
    return { record, coercions: [] };
  }

  logger.info(`Attempting to fill ${gaps.length} critical gaps`, {
    paths: gaps.map((gap) => gap.path),
  });

  const prompt = buildGapFillPrompt(
    gaps.map((gap) => gap.path),
    documents,
    options.maxDocChars ?? DEFAULT_GAP_FILL_DOC_CHARS
  );
  const raw = await client.callRequired(prompt, { label: 'gap refill', responseTokens: REFILL_RESPONSE_TOKENS });
  const { record: updates, coercions } = canonicalizeRecord(
    parseExtractionResponse(raw),
    options.template ?? loadTenderTemplate()
  );

  return { record: deepMerge(record, presentLeaves(updates)), coercions };
}

/** Only the non-empty leaves of `section`; sections left empty are dropped. */
function presentLeaves(section: RecordSection): RecordSection {
  const result: RecordSection = {};
  for (const [key, value] of Object.entries(section)) {
    if (isRecordSection(value)) {
      const child = presentLeaves(value);
      if (Object.keys(child).length > 0) result[key] = child;
    } else if (!isEmptyValue(value)) {
      result[key] = value;
    }
  }
  return result;
}

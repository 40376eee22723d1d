import { SchemaCoercionError } from '../errors.js';
import { readValidatedDataFile } from '../utils/dataFiles.js';
import { isJsonObject, validator, type JsonObject } from '../utils/validators.js';
import type { CandidateRecord, RecordSection, RecordValue } from './types.js';

/**
 * Record shape helpers: the tender template, boundary coercion and
 * canonicalization.
 */

export function isRecordSection(value: RecordValue | undefined): value is RecordSection {
  return typeof value === 'object' && !Array.isArray(value);
}

export function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isTemplateValue(value: unknown): value is RecordValue {
  if (typeof value === 'string' || isStringList(value)) return true;
  return isJsonObject(value) && Object.values(value).every(isTemplateValue);
}

function isTemplate(value: unknown): value is CandidateRecord {
  return isJsonObject(value) && isTemplateValue(value);
}

const TEMPLATE_FILE_SCHEMA = {
  type: 'object',
  minProperties: 1,
  additionalProperties: {
    anyOf: [
      { type: 'string' },
      { type: 'array', items: { type: 'string' } },
      {
        type: 'object',
        additionalProperties: {
          anyOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }],
        },
      },
    ],
  },
};

let cachedTemplate: CandidateRecord | null = null;

/**
 * The target tender shape, loaded once from data/tender-schema.json.
 * Callers receive a deep copy.
 */
export function loadTenderTemplate(): CandidateRecord {
  if (!cachedTemplate) {
    cachedTemplate = readValidatedDataFile('tender-schema.json', TEMPLATE_FILE_SCHEMA, isTemplate);
  }
  return cloneRecord(cachedTemplate);
}

export function cloneRecord(record: CandidateRecord): CandidateRecord {
  const copy: CandidateRecord = {};
  for (const [key, value] of Object.entries(record)) {
    if (typeof value === 'string') copy[key] = value;
    else if (Array.isArray(value)) copy[key] = [...value];
    else copy[key] = cloneRecord(value);
  }
  return copy;
}

/**
 * Render any JSON value as a string leaf: lists joined with "; ",
 * objects serialized, null/undefined empty.
 */
export function coerceToString(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value.map((item) => coerceToString(item)).join('; ');
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export function coerceToStringList(value: unknown): string[] {
  if (value === null || value === undefined) return [];
  if (typeof value === 'string') return value === '' ? [] : [value];
  if (Array.isArray(value)) return value.map((item) => coerceToString(item));
  return [coerceToString(value)];
}

/**
 * Convert arbitrary capability output into the record tree without a
 * template: objects stay sections, arrays become string lists, everything
 * else becomes a string.
 */
export function toRecordValue(value: unknown): RecordValue {
  if (Array.isArray(value)) return value.map((item) => coerceToString(item));
  if (isJsonObject(value)) return toRecordSection(value);
  return coerceToString(value);
}

export function toRecordSection(value: JsonObject): RecordSection {
  const section: RecordSection = {};
  for (const [key, child] of Object.entries(value)) {
    section[key] = toRecordValue(child);
  }
  return section;
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export interface CanonicalizeResult {
  record: CandidateRecord;
  coercions: SchemaCoercionError[];
}

function canonicalizeSection(
  value: unknown,
  template: RecordSection,
  prefix: string,
  coercions: SchemaCoercionError[]
): RecordSection {
  const source: Record<string, unknown> = isJsonObject(value) ? value : {};
  if (value !== undefined && value !== null && !isJsonObject(value)) {
    coercions.push(new SchemaCoercionError(prefix || 'root', 'object', describe(value)));
  }

  const result: RecordSection = {};
  for (const [key, shape] of Object.entries(template)) {
    const path = prefix ? `${prefix}.${key}` : key;
    const raw: unknown = source[key];

    if (typeof shape === 'string') {
      if (raw !== undefined && raw !== null && typeof raw !== 'string') {
        coercions.push(new SchemaCoercionError(path, 'string', describe(raw)));
      }
      result[key] = coerceToString(raw);
    } else if (Array.isArray(shape)) {
      if (raw !== undefined && raw !== null && !isStringList(raw)) {
        coercions.push(new SchemaCoercionError(path, 'string[]', describe(raw)));
      }
      result[key] = coerceToStringList(raw);
    } else {
      result[key] = canonicalizeSection(raw, shape, path, coercions);
    }
  }
  return result;
}

/**
 * Force capability output into the template's shape.
 *
 * Exactly the template's keys are produced; extra keys are dropped and
 * every wrong-shaped leaf is coerced and reported, never dropped.
 */
export function canonicalizeRecord(value: unknown, template: CandidateRecord = loadTenderTemplate()): CanonicalizeResult {
  const coercions: SchemaCoercionError[] = [];
  const record = canonicalizeSection(value, template, '', coercions);
  return { record, coercions };
}

/**
 * JSON schema that a canonical record for `template` satisfies.
 */
export function recordSchemaFor(template: RecordSection): object {
  const properties: Record<string, object> = {};
  for (const [key, shape] of Object.entries(template)) {
    if (typeof shape === 'string') properties[key] = { type: 'string' };
    else if (Array.isArray(shape)) properties[key] = { type: 'array', items: { type: 'string' } };
    else properties[key] = recordSchemaFor(shape);
  }
  return {
    type: 'object',
    required: Object.keys(template),
    additionalProperties: false,
    properties,
  };
}

/**
 * Check a record against the canonical tender schema.
 */
export function isCanonicalRecord(record: unknown): boolean {
  const schemaId = 'tender-record';
  if (!validator.hasSchema(schemaId)) {
    validator.compileSchema(schemaId, recordSchemaFor(loadTenderTemplate()));
  }
  return validator.validate(schemaId, record).valid;
}

const CLEANUP_STOP_WORDS = new Set([
  'not found',
  'not mentioned',
  'not specified',
  'not available',
  'n/a',
  'tbd',
  '',
  'null',
  'none',
]);

function isStopWord(value: string): boolean {
  return CLEANUP_STOP_WORDS.has(value.trim().toLowerCase());
}

/**
 * Recursively drop placeholder leaves, empty lists and empty sections.
 * List items are dropped only when blank. The envelope's `_metadata` lives
 * outside the record and is never cleaned.
 */
export function cleanEmptyFields(record: CandidateRecord): CandidateRecord {
  const cleaned: CandidateRecord = {};

  for (const [key, value] of Object.entries(record)) {
    if (typeof value === 'string') {
      if (!isStopWord(value)) cleaned[key] = value;
    } else if (Array.isArray(value)) {
      const items = value.filter((item) => item.trim() !== '');
      if (items.length > 0) cleaned[key] = items;
    } else {
      const child = cleanEmptyFields(value);
      if (Object.keys(child).length > 0) cleaned[key] = child;
    }
  }

  return cleaned;
}

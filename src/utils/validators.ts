import { Ajv } from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import { MalformedExtractionError } from '../errors.js';

/**
 * JSON Schema Validator
 *
 * Validates data files, canonical records and capability output against
 * JSON schemas.
 */

const ajv = new Ajv({
  allErrors: true,
  verbose: true,
  strict: false, // Allow additional properties
});

export type JsonObject = Record<string, unknown>;

/**
 * Validation Result
 */
export interface ValidationResult {
  valid: boolean;
  errors?: ErrorObject[];
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validator class for JSON schema validation
 */
export class SchemaValidator {
  private validators: Map<string, ValidateFunction> = new Map();

  /**
   * Compile and cache a schema validator
   * @param schemaId Unique identifier for the schema
   */
  compileSchema(schemaId: string, schema: object): ValidateFunction {
    const cached = this.validators.get(schemaId);
    if (cached) {
      return cached;
    }

    const compiled = ajv.compile(schema);
    this.validators.set(schemaId, compiled);
    return compiled;
  }

  hasSchema(schemaId: string): boolean {
    return this.validators.has(schemaId);
  }

  /**
   * Validate data against a previously compiled schema
   */
  validate(schemaId: string, data: unknown): ValidationResult {
    const compiled = this.validators.get(schemaId);

    if (!compiled) {
      throw new Error(
        `Schema '${schemaId}' not found. Call compileSchema() first.`
      );
    }

    const valid = compiled(data);

    return {
      valid,
      errors: compiled.errors || undefined,
    };
  }

  /**
   * Format validation errors as a readable string
   */
  formatErrors(errors?: ErrorObject[]): string {
    if (!errors || errors.length === 0) {
      return 'No errors';
    }

    return errors
      .map((error) => {
        const path = error.instancePath || 'root';
        const message = error.message || 'validation failed';
        const params = JSON.stringify(error.params);
        return `  • ${path}: ${message} ${params}`;
      })
      .join('\n');
  }
}

/**
 * Global validator instance
 */
export const validator = new SchemaValidator();

/**
 * Remove a markdown code fence around the payload, if any.
 */
export function stripCodeFences(content: string): string {
  const clean = content.trim();

  const jsonFence = clean.indexOf('```json');
  if (jsonFence !== -1) {
    const body = clean.slice(jsonFence + '```json'.length);
    const end = body.indexOf('```');
    return (end === -1 ? body : body.slice(0, end)).trim();
  }

  const fence = clean.indexOf('```');
  if (fence !== -1) {
    const body = clean.slice(fence + 3);
    const end = body.indexOf('```');
    return (end === -1 ? body : body.slice(0, end)).trim();
  }

  return clean;
}

/**
 * Escape raw control characters that appear inside JSON string literals.
 *
 * Models frequently emit multi-line string values with literal newlines;
 * newlines between tokens are left alone.
 */
export function escapeNewlinesInStrings(content: string): string {
  let out = '';
  let inString = false;
  let escaped = false;

  for (const ch of content) {
    if (inString) {
      if (escaped) {
        escaped = false;
        out += ch;
      } else if (ch === '\\') {
        escaped = true;
        out += ch;
      } else if (ch === '"') {
        inString = false;
        out += ch;
      } else if (ch === '\n') {
        out += '\\n';
      } else if (ch === '\r') {
        out += '\\r';
      } else if (ch === '\t') {
        out += '\\t';
      } else {
        out += ch;
      }
    } else {
      if (ch === '"') inString = true;
      out += ch;
    }
  }

  return out;
}

function tryParseObject(candidate: string): JsonObject | undefined {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isJsonObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

const MAX_CONTENT_LENGTH = 200000;

/**
 * Extract and parse the JSON object in a capability response.
 *
 * Order of attempts: fence-stripped text as-is, then with string newlines
 * re-escaped, then the outermost `{...}` span with the same repair.
 *
 * @throws MalformedExtractionError when no attempt yields a JSON object
 */
export function parseExtractionResponse(content: string): JsonObject {
  if (content.length > MAX_CONTENT_LENGTH) {
    throw new MalformedExtractionError(content, new Error(
      `Response content too large (${content.length} chars, max ${MAX_CONTENT_LENGTH})`
    ));
  }

  const clean = stripCodeFences(content);

  const direct = tryParseObject(clean);
  if (direct) return direct;

  const repaired = tryParseObject(escapeNewlinesInStrings(clean));
  if (repaired) return repaired;

  const start = clean.indexOf('{');
  const end = clean.lastIndexOf('}');
  if (start !== -1 && end > start) {
    const span = clean.slice(start, end + 1);
    const fromSpan = tryParseObject(span) ?? tryParseObject(escapeNewlinesInStrings(span));
    if (fromSpan) return fromSpan;
  }

  throw new MalformedExtractionError(content);
}

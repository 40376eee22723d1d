import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';

/**
 * Extraction Error Taxonomy
 *
 * Every failure that crosses a component boundary is one of these classes.
 * `isRetryable` drives the RetryPolicy; `category` drives logging and the
 * rate-limit penalty.
 */

export type ExtractionErrorCategory =
  | 'rate_limit'       // capability answered 429
  | 'authentication'   // bad or missing API key
  | 'network'          // connection / 5xx
  | 'timeout'
  | 'malformed'        // response could not be parsed as JSON
  | 'coercion'         // a leaf had the wrong shape
  | 'unavailable'      // retries exhausted on a required call
  | 'configuration'
  | 'unknown';

export interface ExtractionErrorOptions {
  isRetryable?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ExtractionError extends Error {
  public readonly category: ExtractionErrorCategory;
  public readonly isRetryable: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, category: ExtractionErrorCategory = 'unknown', options: ExtractionErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ExtractionError';
    this.category = category;
    this.isRetryable = options.isRetryable ?? false;
    this.details = options.details;
  }
}

/**
 * A capability call that may succeed if repeated.
 */
export class TransientCapabilityError extends ExtractionError {
  public readonly rateLimited: boolean;
  public readonly retryAfterMs?: number;

  constructor(message: string, options: ExtractionErrorOptions & { rateLimited?: boolean; retryAfterMs?: number; category?: ExtractionErrorCategory } = {}) {
    const rateLimited = options.rateLimited ?? false;
    super(message, options.category ?? (rateLimited ? 'rate_limit' : 'network'), { ...options, isRetryable: true });
    this.name = 'TransientCapabilityError';
    this.rateLimited = rateLimited;
    this.retryAfterMs = options.retryAfterMs;
  }
}

/**
 * The capability answered, but the text is not recoverable JSON.
 */
export class MalformedExtractionError extends ExtractionError {
  public readonly excerpt: string;

  constructor(response: string, cause?: unknown) {
    const excerpt = response.slice(0, 100);
    super(`Invalid JSON response from extraction capability: ${excerpt}...`, 'malformed', {
      details: { length: response.length },
      cause,
    });
    this.name = 'MalformedExtractionError';
    this.excerpt = excerpt;
  }
}

/**
 * A leaf value had the wrong shape. Canonicalization records these as
 * warnings and substitutes a coerced value; they are never thrown out of it.
 */
export class SchemaCoercionError extends ExtractionError {
  public readonly path: string;

  constructor(path: string, expected: string, received: string) {
    super(`Coerced ${path}: expected ${expected}, received ${received}`, 'coercion', {
      details: { path, expected, received },
    });
    this.name = 'SchemaCoercionError';
    this.path = path;
  }
}

/**
 * A required call (single pass, final structuring, gap refill) failed after
 * exhausting its retries. Fatal for the run.
 */
export class CapabilityUnavailableError extends ExtractionError {
  public readonly stage: string;
  public readonly attempts: number;

  constructor(stage: string, attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Extraction capability unavailable during ${stage} after ${attempts} attempt(s): ${reason}`, 'unavailable', {
      details: { stage, attempts },
      cause,
    });
    this.name = 'CapabilityUnavailableError';
    this.stage = stage;
    this.attempts = attempts;
  }
}

export class ConfigurationError extends ExtractionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'configuration', { details });
    this.name = 'ConfigurationError';
  }
}

export function isExtractionError(error: unknown): error is ExtractionError {
  return error instanceof ExtractionError;
}

function readNumericField(source: unknown, key: string): number | undefined {
  if (typeof source !== 'object' || source === null || !(key in source)) return undefined;
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'number' ? value : undefined;
}

function readStringField(source: unknown, key: string): string | undefined {
  if (typeof source !== 'object' || source === null || !(key in source)) return undefined;
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}

function readRetryAfter(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('headers' in error)) return undefined;
  const headers: unknown = Reflect.get(error, 'headers');
  if (typeof headers !== 'object' || headers === null) return undefined;
  // SDK v4 exposes a plain record; fetch-style Headers need get()
  const getter: unknown = Reflect.get(headers, 'get');
  const raw: unknown = typeof getter === 'function'
    ? getter.call(headers, 'retry-after')
    : Reflect.get(headers, 'retry-after');
  if (typeof raw !== 'string' && typeof raw !== 'number') return undefined;
  const seconds = typeof raw === 'number' ? raw : parseInt(raw, 10);
  return Number.isNaN(seconds) ? undefined : seconds * 1000;
}

/**
 * Map an SDK / transport error into the taxonomy.
 *
 * Status codes follow the OpenAI and Anthropic SDK error classes, which both
 * expose `status` and `headers`. Their connection errors carry no status
 * and are always transient; anything else without a status falls back to
 * message matching.
 */
export function fromProviderError(error: unknown, provider: string): ExtractionError {
  if (isExtractionError(error)) return error;

  const status = readNumericField(error, 'status');
  const code = readStringField(error, 'code');
  const message = error instanceof Error ? error.message : String(error);

  if (status === 429 || code === 'rate_limit_exceeded') {
    return new TransientCapabilityError(`Rate limit exceeded for ${provider}: ${message}`, {
      rateLimited: true,
      retryAfterMs: readRetryAfter(error),
      details: { provider, status },
      cause: error,
    });
  }

  if (status === 401 || status === 403) {
    return new ExtractionError(`Authentication failed for ${provider}: ${message}`, 'authentication', {
      details: { provider, status },
      cause: error,
    });
  }

  if (status !== undefined && (status >= 500 || status === 408)) {
    return new TransientCapabilityError(`HTTP ${status} from ${provider}: ${message}`, {
      category: status === 408 ? 'timeout' : 'network',
      details: { provider, status },
      cause: error,
    });
  }

  const lower = message.toLowerCase();
  if (error instanceof OpenAI.APIConnectionError || error instanceof Anthropic.APIConnectionError) {
    const timedOut = lower.includes('timed out');
    return new TransientCapabilityError(`Connection to ${provider} failed: ${message}`, {
      category: timedOut ? 'timeout' : 'network',
      details: { provider },
      cause: error,
    });
  }
  if (lower.includes('timeout') || lower.includes('timed out')) {
    return new TransientCapabilityError(`Request to ${provider} timed out: ${message}`, { category: 'timeout', cause: error });
  }
  if (lower.includes('econnreset') || lower.includes('econnrefused') || lower.includes('enotfound') || lower.includes('network')) {
    return new TransientCapabilityError(`Network error connecting to ${provider}: ${message}`, { cause: error });
  }

  return new ExtractionError(message, 'unknown', { details: { provider, status }, cause: error });
}

import { ExtractionClient } from '../concurrent/ExtractionClient.js';
import { RateBudgetController } from '../core/RateBudgetController.js';
import { RetryPolicy, type RetryPolicyOptions } from '../core/RetryPolicy.js';
import type { ExtractionCapability } from '../core/providers/ExtractionCapability.js';
import { cloneRecord, isRecordSection, loadTenderTemplate } from '../pipeline/record.js';
import type { CandidateRecord, RecordSection, RecordValue } from '../pipeline/types.js';

/**
 * In-process capability: answers with `respond` and records every prompt.
 */
export class FakeCapability implements ExtractionCapability {
  readonly name = 'fake';
  readonly prompts: string[] = [];
  private inFlight = 0;
  maxInFlight = 0;

  constructor(private respond: (prompt: string) => string | Promise<string>) {}

  async call(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      return await this.respond(prompt);
    } finally {
      this.inFlight--;
    }
  }

  get calls(): number {
    return this.prompts.length;
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Client with a budget large enough never to wait and a retry policy that
 * does not sleep.
 */
export function testClient(capability: ExtractionCapability, retry: RetryPolicyOptions = {}): ExtractionClient {
  const rateBudget = new RateBudgetController({ requestsPerMinute: 100_000, tokensPerMinute: 100_000_000 });
  const retryPolicy = new RetryPolicy({ sleep: async () => {}, random: () => 0, ...retry });
  return new ExtractionClient(capability, rateBudget, retryPolicy);
}

function fillSection(section: RecordSection, prefix: string): RecordSection {
  const filled: RecordSection = {};
  for (const [key, shape] of Object.entries(section)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (typeof shape === 'string') filled[key] = `Value of ${path}`;
    else if (Array.isArray(shape)) filled[key] = [`Item of ${path}`];
    else filled[key] = fillSection(shape, path);
  }
  return filled;
}

/**
 * Template-shaped record with every leaf populated: strings read
 * `Value of <path>`, lists hold one `Item of <path>`.
 */
export function filledRecord(): CandidateRecord {
  return fillSection(loadTenderTemplate(), '');
}

export function withLeaf(record: CandidateRecord, section: string, field: string, value: string | string[]): CandidateRecord {
  const copy = cloneRecord(record);
  if (section === 'root') {
    copy[field] = value;
    return copy;
  }
  const node = copy[section];
  if (!isRecordSection(node)) {
    throw new Error(`No section ${section}`);
  }
  node[field] = value;
  return copy;
}

export function leaf(record: CandidateRecord, section: string, field: string): RecordValue | undefined {
  const node = record[section];
  return isRecordSection(node) ? node[field] : undefined;
}

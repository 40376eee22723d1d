import { describe, expect, it } from 'vitest';
import { delay, FakeCapability, filledRecord, leaf, testClient, withLeaf } from '../../__tests__/helpers.js';
import { DEFAULT_PIPELINE_SETTINGS } from '../../config/pipeline.js';
import type { DocumentSource } from '../../documents/FileDocumentSource.js';
import { CapabilityUnavailableError, MalformedExtractionError } from '../../errors.js';
import { PipelineOrchestrator } from '../PipelineOrchestrator.js';
import { createPipeline } from '../createPipeline.js';
import type { SourceDocument } from '../types.js';

const MICRO = 'Summarize the following document chunk';
const FINAL = 'MICRO-SUMMARIES';
const GAP_FILL = 'MISSING FIELDS';

function notice(): SourceDocument {
  const lines = ['Tender No: WB/PWD/2024/117', 'EMD: Rs. 25,000'];
  for (let i = 1; lines.length < 500; i++) {
    lines.push(`Clause ${i}: The contractor shall maintain the works in good order.`);
  }
  return { id: 'notice.txt', text: lines.join('\n'), references: [] };
}

/** 120 lines of 99 characters: about 3000 estimated tokens once combined. */
function longDocument(): SourceDocument {
  const lines: string[] = [];
  for (let i = 1; i <= 120; i++) {
    lines.push(`Clause ${String(i).padStart(3, '0')} ${'x'.repeat(88)}`);
  }
  return { id: 'doc.txt', text: lines.join('\n'), references: [] };
}

const hierarchicalSettings = { singlePassTokenLimit: 1000, chunkSizeChars: 2500 };

describe('PipelineOrchestrator', () => {
  it('extracts a document under the ceiling with exactly one call', async () => {
    const record = filledRecord();
    const capability = new FakeCapability(() => JSON.stringify(record));
    const orchestrator = new PipelineOrchestrator({ client: testClient(capability) });
    const document = notice();
    const combined = `\n\n=== notice.txt ===\n${document.text}`;

    const { envelope, stages } = await orchestrator.run([document], 'run-a');

    expect(capability.calls).toBe(1);
    expect(capability.prompts[0]).toContain(
      '=== PRE-EXTRACTED DATA ===\n{\n  "tender_id": "WB/PWD/2024/117",\n  "emd": "₹25,000"\n}\n\n' +
        `=== COMPLETE TENDER DOCUMENT ===\n${combined}\n`
    );
    expect(stages).toEqual(['CLASSIFY', 'PRE_EXTRACT', 'SINGLE_PASS', 'GAP_FILL', 'FINALIZE']);
    expect(envelope.record).toEqual(record);
    expect(envelope._metadata).toMatchObject({
      document_type: 'Generic',
      files_processed: ['notice.txt'],
      estimated_tokens: Math.floor(combined.length / 4),
      fields_filled_by_refill: 0,
      strategy: 'SINGLE_PASS',
      chunk_errors: 0,
      coercion_warnings: [],
    });
    expect(envelope._metadata.validation.isValid).toBe(true);
  });

  it('fans out over chunks and merges them with one final call', async () => {
    const record = filledRecord();
    const capability = new FakeCapability(async (prompt) => {
      if (prompt.includes(FINAL)) return JSON.stringify(record);
      await delay(5);
      return '{"summary": "noted"}';
    });
    const orchestrator = new PipelineOrchestrator({
      client: testClient(capability),
      settings: { ...hierarchicalSettings, fanOutConcurrency: 3 },
    });

    const { envelope, stages } = await orchestrator.run([longDocument()]);

    const microPrompts = capability.prompts.filter((prompt) => prompt.includes(MICRO));
    const finalPrompts = capability.prompts.filter((prompt) => prompt.includes(FINAL));

    expect(capability.calls).toBe(6);
    expect(microPrompts).toHaveLength(5);
    expect(finalPrompts).toHaveLength(1);
    expect(capability.maxInFlight).toBeLessThanOrEqual(3);
    expect(microPrompts.some((prompt) => prompt.includes('CHUNK:\n=== doc.txt ===\nClause 001 '))).toBe(true);
    expect(finalPrompts[0]).toContain('--- CHUNK 5 ---\n{"summary":"noted"}');
    expect(stages).toEqual(['CLASSIFY', 'PRE_EXTRACT', 'HIERARCHICAL', 'GAP_FILL', 'FINALIZE']);
    expect(envelope._metadata.strategy).toBe('HIERARCHICAL');
    expect(envelope._metadata.estimated_tokens).toBe(3004);
    expect(envelope.record).toEqual(record);
  });

  it('carries on past a failed chunk and refills the gaps it leaves', async () => {
    const merged = withLeaf(filledRecord(), 'key_dates', 'bid_end', '');
    const capability = new FakeCapability((prompt) => {
      if (prompt.includes(GAP_FILL)) return '{"key_dates": {"bid_end": "15-04-2024 17:00"}}';
      if (prompt.includes(FINAL)) return JSON.stringify(merged);
      if (prompt.includes('Clause 050')) throw new Error('upstream exploded');
      return '{"summary": "noted"}';
    });
    const orchestrator = new PipelineOrchestrator({ client: testClient(capability), settings: hierarchicalSettings });

    const { envelope } = await orchestrator.run([longDocument()]);

    const finalPrompt = capability.prompts.find((prompt) => prompt.includes(FINAL)) ?? '';
    const gapPrompt = capability.prompts.find((prompt) => prompt.includes(GAP_FILL)) ?? '';

    expect(capability.calls).toBe(7);
    expect(finalPrompt).toContain('--- CHUNK 3 ---\n[CHUNK 3 ERROR] upstream exploded');
    expect(gapPrompt).toContain('MISSING FIELDS:\n- key_dates.bid_end\n\n');
    expect(gapPrompt).toContain('--- Doc: doc.txt ---\nClause 001 ');
    expect(leaf(envelope.record, 'key_dates', 'bid_end')).toBe('15-04-2024 17:00');
    expect(envelope._metadata.chunk_errors).toBe(1);
    expect(envelope._metadata.fields_filled_by_refill).toBe(1);
  });

  it('seeds the record with rule-extracted values the capability left empty', async () => {
    const answer = withLeaf(filledRecord(), 'financial_requirements', 'emd', '');
    const capability = new FakeCapability(() => JSON.stringify(answer));
    const orchestrator = new PipelineOrchestrator({ client: testClient(capability) });

    const { envelope } = await orchestrator.run([notice()]);

    expect(capability.calls).toBe(1);
    expect(leaf(envelope.record, 'financial_requirements', 'emd')).toBe('₹25,000');
  });

  it('merges resolved references into the first document', async () => {
    const capability = new FakeCapability(() => JSON.stringify(filledRecord()));
    const documentSource: DocumentSource = {
      load: async () => {
        throw new Error('not used');
      },
      resolveReference: async (reference) =>
        reference === 'annex.txt' ? { id: 'annex.txt', text: 'Annexure text', references: [] } : null,
    };
    const orchestrator = new PipelineOrchestrator({ client: testClient(capability), documentSource });

    await orchestrator.run([
      { id: 'notice.txt', text: 'Short notice', references: ['annex.txt', 'https://example.org/boq.pdf'] },
      { id: 'corrigendum.txt', text: 'Date extended', references: [] },
    ]);

    expect(capability.prompts[0]).toContain(
      '=== notice.txt ===\nShort notice\n\n=== External: annex.txt ===\nAnnexure text\n\n=== corrigendum.txt ===\nDate extended'
    );
  });

  it('fails the run when a required call is unavailable', async () => {
    const capability = new FakeCapability(() => {
      throw Object.assign(new Error('Service unavailable'), { status: 503 });
    });
    const orchestrator = new PipelineOrchestrator({ client: testClient(capability, { maxAttempts: 3 }) });

    await expect(orchestrator.run([notice()])).rejects.toBeInstanceOf(CapabilityUnavailableError);
    expect(capability.calls).toBe(3);
  });

  it('fails the run when the final answer is not JSON', async () => {
    const capability = new FakeCapability(() => 'Sorry, I cannot help with that.');
    const orchestrator = new PipelineOrchestrator({ client: testClient(capability), settings: hierarchicalSettings });

    await expect(orchestrator.run([longDocument()])).rejects.toBeInstanceOf(MalformedExtractionError);
  });
});

describe('createPipeline', () => {
  it('wires the given capability behind one shared rate budget', () => {
    const capability = new FakeCapability(() => '{}');
    const components = createPipeline({ ...DEFAULT_PIPELINE_SETTINGS }, { capability });

    expect(components.client.capability).toBe(capability);
    expect(components.rateBudget.snapshot().requestCapacity).toBe(DEFAULT_PIPELINE_SETTINGS.requestsPerMinute);
    expect(components.orchestrator).toBeInstanceOf(PipelineOrchestrator);
  });
});

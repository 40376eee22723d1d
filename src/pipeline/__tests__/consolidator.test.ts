import { describe, expect, it } from 'vitest';
import { FakeCapability, leaf, testClient } from '../../__tests__/helpers.js';
import { finalStructure, mergeMicroResults, normalizeMicroResult } from '../consolidator.js';
import { loadTenderTemplate } from '../record.js';

describe('normalizeMicroResult', () => {
  it('re-serializes JSON answers compactly', () => {
    expect(normalizeMicroResult('```json\n{"emd": "Rs 5,000"}\n```')).toBe('{"emd":"Rs 5,000"}');
  });

  it('keeps prose answers as trimmed text', () => {
    expect(normalizeMicroResult('  EMD is Rs 5,000.  ')).toBe('EMD is Rs 5,000.');
  });
});

describe('mergeMicroResults', () => {
  const partials = ['{"a":1}', '[CHUNK 2 ERROR] boom'];

  it('numbers each partial after the pre-extracted header', () => {
    expect(mergeMicroResults(partials, {})).toEqual({
      context: '=== PRE-EXTRACTED DATA ===\n{}\n\n--- CHUNK 1 ---\n{"a":1}\n\n--- CHUNK 2 ---\n[CHUNK 2 ERROR] boom',
      included: 2,
      dropped: 0,
    });
  });

  it('stops adding sections at the character limit', () => {
    // header (31) + first section (23) fits in 60; the second (38) does not
    expect(mergeMicroResults(partials, {}, { maxChars: 60 })).toEqual({
      context: '=== PRE-EXTRACTED DATA ===\n{}\n\n--- CHUNK 1 ---\n{"a":1}',
      included: 1,
      dropped: 1,
    });
  });
});

describe('finalStructure', () => {
  it('makes one call and returns a canonical record', async () => {
    const capability = new FakeCapability(() => '{"tender_meta": {"tender_id": "T-9"}}');
    const template = loadTenderTemplate();

    const { record, coercions } = await finalStructure(testClient(capability), 'merged context', template);

    expect(capability.calls).toBe(1);
    expect(capability.prompts[0]).toContain('MICRO-SUMMARIES:\nmerged context\n\nOUTPUT SCHEMA:\n');
    expect(capability.prompts[0]).toContain('prefer the most recent or specific one');
    expect(leaf(record, 'tender_meta', 'tender_id')).toBe('T-9');
    expect(Object.keys(record)).toEqual(Object.keys(template));
    expect(coercions).toEqual([]);
  });
});

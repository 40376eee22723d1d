import { describe, expect, it } from 'vitest';
import { FakeCapability, filledRecord, leaf, testClient, withLeaf } from '../../__tests__/helpers.js';
import { MalformedExtractionError } from '../../errors.js';
import { criticalGaps, deepMerge, isEmptyValue, refill, scanForGaps, summarizeGaps } from '../gapAnalyzer.js';

describe('isEmptyValue', () => {
  it('treats placeholders, blank lists and empty objects as empty', () => {
    const empties: unknown[] = [null, undefined, '', '   ', 'Not Mentioned', 'n/a', 'TBD', [], ['', 'N/A'], {}];
    for (const value of empties) {
      expect(isEmptyValue(value)).toBe(true);
    }
  });

  it('treats real values as present', () => {
    const present: unknown[] = ['0', 'No', ['PAN Card'], { a: '' }];
    for (const value of present) {
      expect(isEmptyValue(value)).toBe(false);
    }
  });
});

describe('scanForGaps', () => {
  it('reports empty leaves in tree order with their criticality', () => {
    let record = withLeaf(filledRecord(), 'tender_meta', 'funded_project', '');
    record = withLeaf(record, 'key_dates', 'bid_end', 'N/A');
    record = withLeaf(record, 'root', 'executive_summary', '');

    expect(scanForGaps(record)).toEqual([
      { section: 'tender_meta', field: 'funded_project', path: 'tender_meta.funded_project', isCritical: false },
      { section: 'key_dates', field: 'bid_end', path: 'key_dates.bid_end', isCritical: true },
      { section: 'root', field: 'executive_summary', path: 'executive_summary', isCritical: true },
    ]);
    expect(summarizeGaps(record)).toEqual({
      totalMissing: 3,
      criticalMissing: 2,
      bySection: { tender_meta: 1, key_dates: 1, root: 1 },
    });
  });

  it('finds nothing in a fully populated record', () => {
    expect(scanForGaps(filledRecord())).toEqual([]);
  });
});

describe('deepMerge', () => {
  it('merges sections recursively without touching its inputs', () => {
    const base = { key_dates: { bid_start: '2024-01-01', bid_end: '' }, executive_summary: 'Old' };
    const updates = { key_dates: { bid_end: '2024-02-01' } };

    const merged = deepMerge(base, updates);

    expect(merged).toEqual({ key_dates: { bid_start: '2024-01-01', bid_end: '2024-02-01' }, executive_summary: 'Old' });
    expect(base.key_dates.bid_end).toBe('');
    expect(updates).toEqual({ key_dates: { bid_end: '2024-02-01' } });
  });

  it('never overwrites a value with an empty one', () => {
    const merged = deepMerge({ a: 'kept', b: ['x'] }, { a: 'Not mentioned', b: [], c: '' });
    expect(merged).toEqual({ a: 'kept', b: ['x'] });
  });

  it('is idempotent', () => {
    const record = withLeaf(filledRecord(), 'key_dates', 'bid_end', '');
    expect(deepMerge(record, record)).toEqual(record);
    expect(deepMerge(record, {})).toEqual(record);
  });
});

describe('refill', () => {
  it('fills the one critical gap and leaves present fields alone', async () => {
    let record = withLeaf(filledRecord(), 'key_dates', 'bid_end', '');
    record = withLeaf(record, 'key_dates', 'bid_start', '2024-01-01');

    const gaps = criticalGaps(record);
    expect(gaps).toEqual([{ section: 'key_dates', field: 'bid_end', path: 'key_dates.bid_end', isCritical: true }]);

    const capability = new FakeCapability(() => '{"key_dates":{"bid_end":"2024-02-01"}}');
    const result = await refill(testClient(capability), record, gaps, [{ id: 'notice.txt', text: 'Bid end 01-02-2024', references: [] }]);

    expect(leaf(result.record, 'key_dates', 'bid_end')).toBe('2024-02-01');
    expect(leaf(result.record, 'key_dates', 'bid_start')).toBe('2024-01-01');
    expect(result.coercions).toEqual([]);
    expect(capability.calls).toBe(1);
    expect(capability.prompts[0]).toContain(
      'MISSING FIELDS:\n- key_dates.bid_end\n\nDOCUMENT CONTEXT (Truncated):\n--- Doc: notice.txt ---\nBid end 01-02-2024'
    );

    // Nothing left to ask for
    expect(criticalGaps(result.record)).toEqual([]);

    const again = await refill(testClient(capability), result.record, criticalGaps(result.record), []);
    expect(again.record).toBe(result.record);
    expect(capability.calls).toBe(1);
  });

  it('merges into a partial record without reshaping it', async () => {
    const record = { key_dates: { bid_end: '', bid_start: '2024-01-01' }, notes: { reviewer: 'kept' } };
    const capability = new FakeCapability(() => '{"key_dates":{"bid_end":"2024-02-01"}}');
    const gaps = criticalGaps(record);

    const result = await refill(testClient(capability), record, gaps, []);

    expect(gaps).toHaveLength(1);
    expect(criticalGaps(result.record)).toEqual([]);
    expect(result.record).toEqual({
      key_dates: { bid_end: '2024-02-01', bid_start: '2024-01-01' },
      notes: { reviewer: 'kept' },
    });
  });

  it('reports coercions from the refill answer', async () => {
    const record = { key_dates: { bid_end: '' } };
    const capability = new FakeCapability(() => '{"key_dates":{"bid_end":["15-04-2024","17:00"]}}');

    const result = await refill(testClient(capability), record, criticalGaps(record), []);

    expect(result.record).toEqual({ key_dates: { bid_end: '15-04-2024; 17:00' } });
    expect(result.coercions.map((coercion) => coercion.message)).toEqual([
      'Coerced key_dates.bid_end: expected string, received array',
    ]);
  });

  it('makes no call when there are no gaps', async () => {
    const capability = new FakeCapability(() => '{}');
    const record = filledRecord();

    const result = await refill(testClient(capability), record, [], []);

    expect(result.record).toBe(record);
    expect(capability.calls).toBe(0);
  });

  it('rejects a refill answer that is not JSON', async () => {
    const record = withLeaf(filledRecord(), 'key_dates', 'bid_end', '');
    const capability = new FakeCapability(() => 'I could not find it.');

    await expect(refill(testClient(capability), record, criticalGaps(record), [])).rejects.toBeInstanceOf(
      MalformedExtractionError
    );
  });
});

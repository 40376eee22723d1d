import { describe, expect, it } from 'vitest';
import { filledRecord, withLeaf } from '../../__tests__/helpers.js';
import { validateCompleteness } from '../validation.js';

describe('validateCompleteness', () => {
  it('accepts a complete generic record', () => {
    expect(validateCompleteness(filledRecord(), 'Generic')).toEqual({
      isValid: true,
      missingFields: [],
      warnings: [],
      portalType: 'Generic',
      summary: { totalIssues: 0, missingFieldsCount: 0, warningsCount: 0 },
    });
  });

  it('reports missing required fields and the common warnings', () => {
    let record = withLeaf(filledRecord(), 'tender_meta', 'tender_id', 'Not found');
    record = withLeaf(record, 'key_dates', 'bid_end', '');

    const result = validateCompleteness(record, 'Generic');

    expect(result.isValid).toBe(false);
    expect(result.missingFields).toEqual(['tender_meta.tender_id', 'key_dates.bid_end']);
    expect(result.warnings).toEqual([
      'Tender ID is missing - this is a critical field',
      'Bid end date is missing - this is critical for bidding timeline',
    ]);
    expect(result.summary).toEqual({ totalIssues: 4, missingFieldsCount: 2, warningsCount: 2 });
  });

  it('checks the GeM pre-qualification format', () => {
    const unseparated = validateCompleteness(filledRecord(), 'GeM');
    expect(unseparated.isValid).toBe(true);
    expect(unseparated.warnings).toEqual([
      'pre_qualification_requirement format may be incomplete (missing | separators)',
    ]);

    const record = withLeaf(filledRecord(), 'root', 'pre_qualification_requirement', 'Bidder Turnover: ₹50 Lakh(s) | Experience: 3 Year(s)');
    expect(validateCompleteness(record, 'GeM').warnings).toEqual([]);
  });

  it('flags a CPPP record without envelope documents', () => {
    let record = withLeaf(filledRecord(), 'documents_required', 'online_submission_documents', []);
    record = withLeaf(record, 'documents_required', 'offline_submission_documents', []);

    const result = validateCompleteness(record, 'CPPP');

    expect(result.missingFields).toEqual([
      'documents_required.online_submission_documents',
      'documents_required.offline_submission_documents',
    ]);
    expect(result.warnings).toEqual([
      'online_submission_documents is empty - CPPP tenders must separate online docs',
      'offline_submission_documents is empty - check if physical submission is required',
      'Neither online nor offline submission documents found - envelope structure may not be extracted',
    ]);
  });
});

import { describe, expect, it } from 'vitest';
import { extractDocumentList, TenderRuleExtractor } from '../TenderRuleExtractor.js';

const extractor = new TenderRuleExtractor();

describe('TenderRuleExtractor', () => {
  it('extracts the generic fields of a plain notice', () => {
    const text = [
      'Tender No: WB/PWD/2024/117',
      'EMD: Rs. 25,000',
      'Bid Submission End Date: 15-04-2024 17:00',
      'Bid Validity: 120 days',
      'Minimum 5 years of experience',
      'Joint Venture is not allowed',
      'MSMEs are exempted from EMD',
    ].join('\n');

    expect(extractor.extract(text, 'Generic')).toEqual({
      portal: null,
      fields: {
        tender_id: 'WB/PWD/2024/117',
        emd: '₹25,000',
        bid_end: '15-04-2024 17:00',
        bid_validity: '120 days',
        experience_required: '5 years',
        consortium_or_jv_allowed: 'Joint Venture is not allowed',
        msme_startup_exemption: 'MSME exempted',
      },
    });
  });

  it('ignores identifiers without a digit', () => {
    expect(extractor.extract('Ref: ABCD', 'Generic').fields.tender_id).toBeUndefined();
  });

  it('reads the GeM bid details and pre-qualification table', () => {
    const text = [
      'Bid Number: GEM/2024/B/4567890',
      'Item Category: Office Chairs',
      'Total Quantity: 250',
      'Two Packet Bid',
      'ePBG Percentage: 5%',
      'Minimum Average Annual Turnover of the bidder (For 3 Years)',
      '50',
      'Years of Past Experience Required for same/similar service',
      '3 Year(s)',
      'MSE Relaxation for Years Of Experience and Turnover',
      'Yes | Complete',
      'Document required from seller',
      'Experience Criteria, Bidder Turnover, Certificate (Requested in ATC)',
      '',
      'Bid to RA: Yes',
      'Evaluation Method: Total value wise evaluation',
    ].join('\n');

    expect(extractor.extract(text, 'GeM')).toEqual({
      portal: null,
      fields: {
        tender_id: 'GEM/2024/B/4567890',
        item_category: 'Office Chairs',
        total_quantity: '250',
        type_of_bid: 'Two Packet Bid',
        epbg_details: 'Percentage: 5%',
        turnover_requirement: '₹50 Lakh(s)',
        experience_required: '3 Year(s)',
        mse_relaxation: 'Yes | Complete',
        pre_qualification_requirement:
          'Bidder Turnover: ₹50 Lakh(s) | Experience: 3 Year(s) | MSE Relaxation: Yes | Complete',
        documents_required: ['Experience Criteria', 'Bidder Turnover', 'Certificate (Requested in ATC)'],
        evaluation_method: 'Total',
        bid_to_ra_enabled: 'Yes',
      },
    });
  });

  it('separates CPPP envelope and hardcopy documents', () => {
    const text = [
      'Central Public Procurement Portal',
      'NIT No: CE/ROADS/2024/88',
      'Date & Time of Issue: 01-03-2024 10:00',
      'Due Date & Time of Submission: 25-03-2024 15:00',
      'Computer System: Windows 10 or above',
      'The Engineer reserves the Right to Reject any or all tenders without assigning any reason.',
      '',
      'Hardcopy Submission',
      '- Original EMD instrument',
      '- Signed tender document',
      '',
      'Envelope-1 (Technical Bid)',
      '- Scanned copy of EMD',
      '- PAN Card',
      'Envelope-2 (Financial Bid)',
      '- BOQ in prescribed format',
    ].join('\n');

    expect(extractor.extract(text, 'CPPP')).toEqual({
      portal: 'CPPP',
      fields: {
        tender_id: 'CE/ROADS/2024/88',
        portal: 'CPPP',
        date_and_time_of_issue: '01-03-2024 10:00',
        due_date_and_time_of_submission: '25-03-2024 15:00',
        online_submission_documents: ['Scanned copy of EMD', 'PAN Card', 'BOQ in prescribed format'],
        offline_submission_documents: ['Original EMD instrument', 'Signed tender document'],
        bidder_technical_infrastructure: 'Computer System: Windows 10 or above',
        rejection_of_bid: 'Yes',
      },
    });
  });
});

describe('extractDocumentList', () => {
  it('reads bullets and numbered lines under the heading and skips notes', () => {
    const section = ['Documents', '1. PAN Card', '• GST Certificate', 'Note', 'x', ''].join('\n');
    expect(extractDocumentList(section)).toEqual(['PAN Card', 'GST Certificate']);
  });
});

import { createLogger } from '../utils/logger.js';
import { isEmptyValue } from './gapAnalyzer.js';
import { isRecordSection } from './record.js';
import type { CandidateRecord, FieldPath, PortalLabel, RecordValue, ValidationSummary } from './types.js';

const logger = createLogger('Validation');

/**
 * Portal Validation
 *
 * Required-field and consistency checks per document type. Problems are
 * reported in the summary; nothing here throws.
 */

type RequiredFields = Readonly<Record<string, readonly string[]>>;

const GEM_REQUIRED_FIELDS: RequiredFields = {
  tender_meta: ['tender_id', 'tender_title', 'portal', 'item_category', 'total_quantity', 'boq_title'],
  eligibility_snapshot: ['turnover_requirement', 'oem_turnover_requirement', 'experience_required'],
  financial_requirements: ['epbg_details'],
  additional_important_information: ['evaluation_method', 'bid_to_ra_enabled', 'technical_clarification_time', 'buyer_added_atc'],
  root: ['pre_qualification_requirement'],
};

const CPPP_REQUIRED_FIELDS: RequiredFields = {
  tender_meta: ['tender_id', 'tender_title', 'portal'],
  key_dates: ['date_and_time_of_issue', 'due_date_and_time_of_submission'],
  documents_required: ['online_submission_documents', 'offline_submission_documents'],
  eligibility_snapshot: ['bidder_technical_infrastructure'],
};

const GENERIC_REQUIRED_FIELDS: RequiredFields = {
  tender_meta: ['tender_id', 'tender_title'],
  key_dates: ['bid_end'],
  financial_requirements: ['emd'],
};

const REQUIRED_BY_LABEL: Record<PortalLabel, RequiredFields> = {
  GeM: GEM_REQUIRED_FIELDS,
  CPPP: CPPP_REQUIRED_FIELDS,
  Generic: GENERIC_REQUIRED_FIELDS,
};

function isFieldEmpty(value: RecordValue | undefined): boolean {
  return isEmptyValue(value) || (typeof value === 'string' && value.trim().toLowerCase() === 'not found');
}

function fieldAt(record: CandidateRecord, section: string, field: string): RecordValue | undefined {
  if (section === 'root') return record[field];
  const node = record[section];
  return isRecordSection(node) ? node[field] : undefined;
}

function missingRequired(record: CandidateRecord, label: PortalLabel): FieldPath[] {
  const missing: FieldPath[] = [];
  for (const [section, fields] of Object.entries(REQUIRED_BY_LABEL[label])) {
    for (const field of fields) {
      if (isFieldEmpty(fieldAt(record, section, field))) {
        missing.push(`${section}.${field}`);
      }
    }
  }
  return missing;
}

function gemWarnings(record: CandidateRecord): string[] {
  const warnings: string[] = [];
  const preQualification = fieldAt(record, 'root', 'pre_qualification_requirement');

  if (isFieldEmpty(preQualification)) {
    warnings.push('pre_qualification_requirement is empty - GeM tenders MUST have this');
  }
  if (isFieldEmpty(fieldAt(record, 'documents_required', 'documents_required'))) {
    warnings.push('documents_required is empty - should contain pre-qual documents');
  }
  if (typeof preQualification === 'string' && !preQualification.includes('|')) {
    warnings.push('pre_qualification_requirement format may be incomplete (missing | separators)');
  }
  return warnings;
}

function cpppWarnings(record: CandidateRecord): string[] {
  const warnings: string[] = [];
  const onlineMissing = isFieldEmpty(fieldAt(record, 'documents_required', 'online_submission_documents'));
  const offlineMissing = isFieldEmpty(fieldAt(record, 'documents_required', 'offline_submission_documents'));

  if (onlineMissing) {
    warnings.push('online_submission_documents is empty - CPPP tenders must separate online docs');
  }
  if (offlineMissing) {
    warnings.push('offline_submission_documents is empty - check if physical submission is required');
  }
  if (
    isFieldEmpty(fieldAt(record, 'key_dates', 'date_and_time_of_issue')) ||
    isFieldEmpty(fieldAt(record, 'key_dates', 'due_date_and_time_of_submission'))
  ) {
    warnings.push('CPPP date fields should have specific labels - verify extraction');
  }
  if (onlineMissing && offlineMissing) {
    warnings.push('Neither online nor offline submission documents found - envelope structure may not be extracted');
  }
  return warnings;
}

export function validateCompleteness(record: CandidateRecord, label: PortalLabel): ValidationSummary {
  logger.info(`Validating ${label} extraction`);

  const missingFields = missingRequired(record, label);
  const warnings = label === 'GeM' ? gemWarnings(record) : label === 'CPPP' ? cpppWarnings(record) : [];

  if (isFieldEmpty(fieldAt(record, 'tender_meta', 'tender_id'))) {
    warnings.push('Tender ID is missing - this is a critical field');
  }
  if (isFieldEmpty(fieldAt(record, 'key_dates', 'bid_end'))) {
    warnings.push('Bid end date is missing - this is critical for bidding timeline');
  }

  for (const path of missingFields) {
    logger.warn(`${label} validation: missing or empty field ${path}`);
  }

  return {
    isValid: missingFields.length === 0,
    missingFields,
    warnings,
    portalType: label,
    summary: {
      totalIssues: missingFields.length + warnings.length,
      missingFieldsCount: missingFields.length,
      warningsCount: warnings.length,
    },
  };
}

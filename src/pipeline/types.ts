/**
 * Pipeline Types
 *
 * Shared shapes for documents, chunks, the candidate record and the
 * result envelope.
 */

/**
 * A decoded source document. `references` are external links found while
 * decoding (e.g. annexure PDFs) that may be resolved into supplementary
 * documents.
 */
export interface SourceDocument {
  readonly id: string;
  readonly text: string;
  readonly references: readonly string[];
}

export interface Chunk {
  readonly index: number;
  readonly text: string;
}

/** Dot-delimited address into the record tree, e.g. `key_dates.bid_end`. */
export type FieldPath = string;

/**
 * Candidate record tree. Leaves are strings or string lists; inner nodes are
 * sections. Capability output is converted into this shape at the boundary.
 */
export type RecordValue = string | string[] | RecordSection;

export interface RecordSection {
  [key: string]: RecordValue;
}

export type CandidateRecord = RecordSection;

export interface MissingFieldRecord {
  section: string;
  field: string;
  path: FieldPath;
  isCritical: boolean;
}

export interface GapSummary {
  totalMissing: number;
  criticalMissing: number;
  bySection: Record<string, number>;
}

export type PortalLabel = 'GeM' | 'CPPP' | 'Generic';

export interface ClassificationScore {
  readonly label: PortalLabel;
  readonly scores: Readonly<Record<string, number>>;
}

/** Flat rule-extracted fields; values keep their template field names. */
export type PreExtractedFields = Record<string, string | string[]>;

export interface RuleExtraction {
  fields: PreExtractedFields;
  portal: PortalLabel | null;
}

export interface ValidationSummary {
  isValid: boolean;
  missingFields: FieldPath[];
  warnings: string[];
  portalType: PortalLabel;
  summary: {
    totalIssues: number;
    missingFieldsCount: number;
    warningsCount: number;
  };
}

export type ExtractionStrategy = 'SINGLE_PASS' | 'HIERARCHICAL';

export type PipelineStage =
  | 'CLASSIFY'
  | 'PRE_EXTRACT'
  | 'SINGLE_PASS'
  | 'HIERARCHICAL'
  | 'GAP_FILL'
  | 'FINALIZE';

export interface ResultMetadata {
  document_type: PortalLabel;
  files_processed: string[];
  estimated_tokens: number;
  fields_filled_by_refill: number;
  strategy: ExtractionStrategy;
  chunk_errors: number;
  coercion_warnings: string[];
  validation: ValidationSummary;
}

export interface ResultEnvelope {
  record: CandidateRecord;
  _metadata: ResultMetadata;
}

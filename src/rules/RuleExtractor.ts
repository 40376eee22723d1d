import type { PortalLabel, RuleExtraction } from '../pipeline/types.js';

/**
 * Rule Extractor Interface
 *
 * Deterministic pre-extraction run before any capability call. Field names
 * in the result are template field names; placeRuleFields() puts them in
 * their sections.
 */
export interface RuleExtractor {
  extract(text: string, label: PortalLabel): RuleExtraction;
}

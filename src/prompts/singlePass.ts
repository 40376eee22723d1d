import type { PortalLabel } from '../pipeline/types.js';
import { renderPrompt } from './render.js';

/**
 * Single-Pass Extraction Prompts
 *
 * One variant per document type. The generic body is shared; the GeM and
 * CPPP variants add the portal's own field guidance.
 *
 * Template variables to replace:
 * - {{SCHEMA_JSON}}
 * - {{RULE_EXTRACTED_DATA}}
 * - {{TENDER_TEXT}}
 */

const SHARED_BODY = `# MISSION
You are a tender analyst. Read the tender below and fill in the JSON schema completely and accurately.

# OUTPUT SCHEMA
Return exactly these keys. Every string field must be a string; every list field must be a list of strings.
{{SCHEMA_JSON}}

# PRE-EXTRACTED FIELDS
These values were matched by rule tables. Keep them unless the document states a more specific value.
{{RULE_EXTRACTED_DATA}}

# TENDER
{{TENDER_TEXT}}

# DIRECTIONS
1. Copy amounts, dates and identifiers exactly as written, including currency symbols and units.
2. If the document gives conflicting values, prefer the most recent or specific one.
3. If information is missing, use empty strings/lists as per schema. Do not invent values.
4. executive_summary: 3-5 sentences a vendor can read to decide whether to bid.
5. vendor_decision_hint: derive eligible_if / not_eligible_if from the eligibility criteria, and key_risks from penalties, guarantees and restrictive clauses.
6. Output ONLY valid JSON.`;

export const GENERIC_SINGLE_PASS_PROMPT = SHARED_BODY;

export const GEM_SINGLE_PASS_PROMPT = `${SHARED_BODY}

# GeM BID DOCUMENT GUIDANCE
- tender_meta.tender_id has the form GEM/YYYY/B/NNNNNNN.
- Fill boq_title, item_category, total_quantity and type_of_bid from the bid details table.
- eligibility_snapshot: take turnover_requirement, oem_turnover_requirement, experience_required, mse_relaxation and startup_relaxation from the pre-qualification table.
- pre_qualification_requirement: one line, the table's items separated by " | ".
- financial_requirements.epbg_details: ePBG percentage and duration.
- additional_important_information: evaluation_method, bid_to_ra_enabled, technical_clarification_time and buyer_added_atc.
- documents_required.documents_required: every item under "Document required from seller".`;

export const CPPP_SINGLE_PASS_PROMPT = `${SHARED_BODY}

# CPPP NOTICE INVITING TENDER GUIDANCE
- tender_meta.tender_id is the NIT / tender reference number.
- key_dates: fill date_and_time_of_issue and due_date_and_time_of_submission with the notice's own labels, alongside the usual bid dates.
- documents_required: list Envelope-1 / Envelope-2 items under online_submission_documents and hardcopy or physical submissions under offline_submission_documents.
- eligibility_snapshot.bidder_technical_infrastructure: computer system, broadband and digital signature certificate requirements.
- legal_and_risk_clauses: note the right to reject bids without assigning reason and the right to split work.`;

const PROMPTS_BY_LABEL: Record<PortalLabel, string> = {
  GeM: GEM_SINGLE_PASS_PROMPT,
  CPPP: CPPP_SINGLE_PASS_PROMPT,
  Generic: GENERIC_SINGLE_PASS_PROMPT,
};

export function buildSinglePassPrompt(
  label: PortalLabel,
  schemaJson: string,
  ruleDataJson: string,
  tenderText: string
): string {
  return renderPrompt(PROMPTS_BY_LABEL[label], {
    SCHEMA_JSON: schemaJson,
    RULE_EXTRACTED_DATA: ruleDataJson,
    TENDER_TEXT: tenderText,
  });
}

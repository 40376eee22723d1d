import type { PortalLabel, PreExtractedFields, RuleExtraction } from '../pipeline/types.js';
import { createLogger } from '../utils/logger.js';
import type { RuleExtractor } from './RuleExtractor.js';

/**
 * Tender Rule Extractor
 *
 * Regex tables for fields that tender notices state in a fixed form. The
 * generic table always runs; the GeM and CPPP tables run when the document
 * is labelled (or self-identifies) as that portal and override generic hits.
 */

const DATE_VALUE = String.raw`(\d{2}[-/.]\d{2}[-/.]\d{4}(?:\s+\d{2}:\d{2}(?::\d{2})?)?)`;
const PURE_DATE = /^\d{1,2}[-/.]\d{1,2}[-/.]\d{2,4}$/;

export const GENERIC_PATTERNS = {
  tenderIdGem: /GEM\/\d{4}\/[A-Z]\/\d+/i,
  tenderIdGeneric:
    /\b(?:Tender\s+(?:No|ID|Reference)|Ref(?:\.?\s*No)?|NIT\s*(?:No|ID|Ref)?|Solicitation\s+No)\.?[\s:]+\s*([A-Z0-9][A-Z0-9\-_/.]{3,})/i,
  emd: /(?:\bEMD|Earnest\s+Money(?:\s+Deposit)?)\s*(?:Amount)?\s*[:-]?\s*₹?\s*(?:Rs\.?)?\s*([\d,]+(?:\.\d{2})?)/i,
  tenderFee: /Tender\s+(?:Fee|Document\s+Fee)\s*[:-]?\s*₹?\s*(?:Rs\.?)?\s*([\d,]+(?:\.\d{2})?)/i,
  performanceSecurity: /Performance\s+(?:Security|Bank\s+Guarantee|Guarantee)\s*[:-]?\s*(\d+\s*%|₹\s*[\d,]+)/i,
  bidEnd: new RegExp(String.raw`Bid\s+(?:Submission\s+)?(?:End|Closing)\s+Date(?:/Time)?\s*[:-]?\s*` + DATE_VALUE, 'i'),
  bidStart: new RegExp(String.raw`Bid\s+(?:Submission\s+)?(?:Start|Opening|Open)\s+Date(?:/Time)?\s*[:-]?\s*` + DATE_VALUE, 'i'),
  technicalOpening: new RegExp(String.raw`Technical\s+Bid\s+Opening(?:\s+Date)?(?:/Time)?\s*[:-]?\s*` + DATE_VALUE, 'i'),
  financialOpening: new RegExp(String.raw`Financial\s+Bid\s+Opening(?:\s+Date)?(?:/Time)?\s*[:-]?\s*` + DATE_VALUE, 'i'),
  bidValidity: /Bid\s+(?:Offer\s+)?Validity(?:\s+\(From\s+End\s+Date\))?\s*[:-]?\s*(\d+)/i,
  turnover: /(?:Annual\s+)?Turnover\s*[:-]?\s*(?:of\s+)?₹?\s*(?:Rs\.?)?\s*([\d,]+(?:\.\d{2})?\s*(?:Lakhs?|Crores?))/i,
  experienceYears: /(?:Experience\s+of\s+|Minimum\s+)(\d+)\s+(?:years?|yrs)/i,
  similarProjects: /(\d+)\s+similar\s+(?:projects?|works?|contracts?)/i,
  portalGem: /Government\s+e-?Marketplace|GeM\s+Portal|gem\.gov\.in/i,
  portalCppp: /Central\s+Public\s+Procurement\s+Portal|\bCPPP\b|eprocure\.gov\.in/i,
  msmeExemption: /MSMEs?\s+(?:are\s+)?exempt(?:ed)?|(?:EMD|Earnest\s+Money)\s+exemption\s+for\s+MSMEs?/i,
  startupExemption: /Startups?\s+(?:are\s+)?exempt(?:ed)?|exemption\s+for\s+Startups?/i,
  localContent: /(?:Minimum\s+Local\s+Content|Local\s+Content|Make\s+in\s+India)\s*[:-]?\s*(\d+\s*%)/i,
  consortium: /(?:Consortium|Joint\s+Venture|\bJV)\s+(?:is\s+)?(?:not\s+)?(?:allowed|permitted)/i,
} as const;

export const GEM_PATTERNS = {
  boqTitle: /(?:BOQ|Bill\s+of\s+Quantities)(?:\s+Title)?\s*[:-]?\s*(.+?)(?:\n|$)/i,
  itemCategory: /(?:Item|Product)\s+Category\s*[:-]?\s*(.+?)(?:\n|$)/i,
  totalQuantity: /(?:Total\s+Quantity|Total\s+Qty\.?|Qty\.?)\s*[:-]?\s*(\d[\d,.]*)/i,
  typeOfBid: /(?:Single|Two)[\s-]*(?:Packet|Part)\s+Bid/i,
  epbgPercentage: /ePBG[^\n%]*?(\d+(?:\.\d+)?\s*%)/i,
  epbgDuration: /ePBG.*?Duration[^\n\d]*(\d+\s*(?:days?|weeks?|months?))/i,
  bidderTurnover: /Minimum\s+Average\s+Annual\s+Turnover\s+of\s+the\s+bidder.*?\n\s*([\d,]+)/is,
  oemTurnover: /OEM\s+Average\s+Turnover.*?\n\s*([\d,]+)/is,
  pastExperience: /Years?\s+of\s+Past\s+Experience\s+Required.*?\n\s*(\d+)\s*Year/is,
  mseRelaxation: /MSE\s+Relaxation\s+for\s+Years.*?\n\s*(Yes|No|Complete|Partial|Exempt)\s*(?:\|\s*(Complete|Partial|Exempt))?/is,
  startupRelaxation: /Startup\s+Relaxation\s+for\s+Years.*?\n\s*(Yes|No|Complete|Partial|Exempt)\s*(?:\|\s*(Complete|Partial|Exempt))?/is,
  sellerDocuments: /Document\s+required\s+from\s+seller\s*\n\s*(.*?)(?:\n\s*\n|\n\s*\*|$)/is,
  evaluationMethod: /Evaluation[^\n]*?(?:Method|Basis)\s*[:-]?\s*(Item[- ]wise|Total)/i,
  bidToRa: /(?:Bid\s+to\s+(?:RA|Reverse\s+Auction)|Reverse\s+Auction)\s*[:-]?\s*(Yes|No|Enabled|Disabled)/i,
  clarificationTime: /(?:Technical\s+Clarification[^\n]*?Time|Clarification\s+Response\s+Time)\s*[:-]?\s*(\d+\s*(?:hours?|days?|minutes?))/i,
  buyerAtc: /Buyer\s+Added\s+(?:Terms\s+and\s+Conditions|T\s*&\s*C|ATC)\s*[:-]?\s*(Yes|No|Present|Absent)/i,
} as const;

export const CPPP_PATTERNS = {
  tenderId: /\b(?:NIT|Tender|Reference|Ref)\s*(?:No\.?|Number)\s*[:-]?\s*([A-Z0-9][A-Z0-9\-_/.]{3,})/i,
  dateOfIssue: /Date\s*&?\s*Time\s+of\s+Issue\s*[:-]?\s*(.+?)(?:\n|$)/i,
  dueDateOfSubmission: /Due\s+Date\s*&?\s*Time\s+of\s+Submission\s*[:-]?\s*(.+?)(?:\n|$)/i,
  envelopeOne: /Envelope[\s-]*(?:1|One|I)\b.*?(?=Envelope[\s-]*(?:2|Two|II)\b|$)/is,
  envelopeTwo: /Envelope[\s-]*(?:2|Two|II)\b.*?(?=Envelope[\s-]*(?:3|Three|III)\b|$)/is,
  offlineSubmission: /(?:Offline\s+Submission|Hardcopy|Physical\s+Submission).*?(?=\n\s*\n|$)/is,
  computerSystem: /Computer\s+(?:System|Requirement)\s*[:-]?\s*(.+?)(?:\n|$)/i,
  broadband: /(?:Broadband|Internet\s+Connection|Bandwidth)\s*[:-]?\s*(.+?)(?:\n|$)/i,
  dsc: /(?:\bDSC\b|Digital\s+Signature\s+Certificate)\s*[:-]?\s*(.+?)(?:\n|$)/i,
  rightToReject:
    /Right\s+to\s+Reject[^\n]*?without\s+(?:assigning\s+)?(?:any\s+)?Reasons?|(?:Tenders|Bids)\s+(?:can|may)\s+be\s+rejected\s+without\s+assigning\s+(?:any\s+)?reasons?/i,
  splitWork: /Right\s+to\s+Split\s+(?:Tender|Work|Project)|Work\s+may\s+be\s+split\s+(?:among|between)|Splitting\s+(?:of\s+)?(?:Tender|Work)/i,
} as const;

function capture(text: string, pattern: RegExp): string | undefined {
  const match = pattern.exec(text);
  if (!match) return undefined;
  const value = (match[1] ?? match[0]).trim();
  return value === '' ? undefined : value;
}

function isPlausibleId(candidate: string): boolean {
  return /\d/.test(candidate) && !PURE_DATE.test(candidate);
}

function relaxation(text: string, pattern: RegExp): string | undefined {
  const match = pattern.exec(text);
  if (!match || match[1] === undefined) return undefined;
  return match[2] ? `${match[1]} | ${match[2]}` : match[1];
}

const DOCUMENT_LINE_PATTERNS = [/^[-•*]\s*(.+)$/, /^\d+[.)]\s*(.+)$/, /^([A-Z][^:\n]*?)(?:\s*[-:]\s*.+)?$/];
const DOCUMENT_NOISE = new Set(['instructions', 'note', 'notes']);

/**
 * Document names listed under a heading, one per bullet, number or
 * capitalized line. The heading line itself is skipped.
 */
export function extractDocumentList(section: string): string[] {
  const documents: string[] = [];

  for (const rawLine of section.split('\n').slice(1)) {
    const line = rawLine.trim();
    if (line.length < 3) continue;

    for (const pattern of DOCUMENT_LINE_PATTERNS) {
      const match = pattern.exec(line);
      if (match && match[1] !== undefined) {
        const doc = match[1].trim();
        if (doc.length > 3 && !DOCUMENT_NOISE.has(doc.toLowerCase())) {
          documents.push(doc);
        }
        break;
      }
    }
  }

  return documents;
}

function sectionDocuments(text: string, pattern: RegExp): string[] {
  const match = pattern.exec(text);
  return match ? extractDocumentList(match[0]) : [];
}

export class TenderRuleExtractor implements RuleExtractor {
  private logger = createLogger('TenderRuleExtractor');

  extract(text: string, label: PortalLabel): RuleExtraction {
    const fields = this.extractGeneric(text);
    const portal: PortalLabel | null = GENERIC_PATTERNS.portalGem.test(text)
      ? 'GeM'
      : GENERIC_PATTERNS.portalCppp.test(text)
        ? 'CPPP'
        : null;

    if (portal) fields.portal = portal;

    if (label === 'GeM' || (label === 'Generic' && portal === 'GeM')) {
      Object.assign(fields, this.extractGem(text));
    } else if (label === 'CPPP' || (label === 'Generic' && portal === 'CPPP')) {
      Object.assign(fields, this.extractCppp(text));
    }

    this.logger.info(`Rule extraction completed`, { label, portal, fields: Object.keys(fields) });
    return { fields, portal };
  }

  extractGeneric(text: string): PreExtractedFields {
    const fields: PreExtractedFields = {};
    const p = GENERIC_PATTERNS;

    const tenderId = capture(text, p.tenderIdGem) ?? capture(text, p.tenderIdGeneric);
    if (tenderId && isPlausibleId(tenderId)) fields.tender_id = tenderId;

    const emd = capture(text, p.emd);
    if (emd) fields.emd = `₹${emd}`;
    const fee = capture(text, p.tenderFee);
    if (fee) fields.tender_fee = `₹${fee}`;
    const security = capture(text, p.performanceSecurity);
    if (security) fields.performance_security = security;

    const bidStart = capture(text, p.bidStart);
    if (bidStart) fields.bid_start = bidStart;
    const bidEnd = capture(text, p.bidEnd);
    if (bidEnd) fields.bid_end = bidEnd;
    const technicalOpening = capture(text, p.technicalOpening);
    if (technicalOpening) fields.technical_bid_opening = technicalOpening;
    const financialOpening = capture(text, p.financialOpening);
    if (financialOpening) fields.financial_bid_opening = financialOpening;
    const validity = capture(text, p.bidValidity);
    if (validity) fields.bid_validity = `${validity} days`;

    const turnover = capture(text, p.turnover);
    if (turnover) fields.turnover_requirement = `₹${turnover}`;

    const years = capture(text, p.experienceYears);
    const projects = capture(text, p.similarProjects);
    const experience = [years && `${years} years`, projects && `${projects} projects`].filter(Boolean).join(' / ');
    if (experience) fields.experience_required = experience;

    const exemptions = [
      p.msmeExemption.test(text) ? 'MSME exempted' : '',
      p.startupExemption.test(text) ? 'Startup exempted' : '',
    ].filter(Boolean);
    if (exemptions.length > 0) fields.msme_startup_exemption = exemptions.join('; ');

    const localContent = capture(text, p.localContent);
    if (localContent) fields.local_content_requirement = localContent;
    const consortium = capture(text, p.consortium);
    if (consortium) fields.consortium_or_jv_allowed = consortium;

    return fields;
  }

  extractGem(text: string): PreExtractedFields {
    const fields: PreExtractedFields = {};
    const p = GEM_PATTERNS;

    const tenderId = capture(text, GENERIC_PATTERNS.tenderIdGem);
    if (tenderId) fields.tender_id = tenderId;

    const boqTitle = capture(text, p.boqTitle);
    if (boqTitle) fields.boq_title = boqTitle;
    const category = capture(text, p.itemCategory);
    if (category) fields.item_category = category;
    const quantity = capture(text, p.totalQuantity);
    if (quantity) fields.total_quantity = quantity;
    const bidType = capture(text, p.typeOfBid);
    if (bidType) fields.type_of_bid = bidType;

    const epbg = [capture(text, p.epbgPercentage), capture(text, p.epbgDuration)];
    const epbgParts = [epbg[0] && `Percentage: ${epbg[0]}`, epbg[1] && `Duration: ${epbg[1]}`].filter(Boolean);
    if (epbgParts.length > 0) fields.epbg_details = epbgParts.join(' | ');

    // Pre-qualification table: label on one line, value on the next
    const preQualification: string[] = [];
    const bidderTurnover = capture(text, p.bidderTurnover);
    if (bidderTurnover) {
      fields.turnover_requirement = `₹${bidderTurnover} Lakh(s)`;
      preQualification.push(`Bidder Turnover: ${fields.turnover_requirement}`);
    }
    const oemTurnover = capture(text, p.oemTurnover);
    if (oemTurnover) {
      fields.oem_turnover_requirement = `₹${oemTurnover} Lakh(s)`;
      preQualification.push(`OEM Turnover: ${fields.oem_turnover_requirement}`);
    }
    const pastExperience = capture(text, p.pastExperience);
    if (pastExperience) {
      fields.experience_required = `${pastExperience} Year(s)`;
      preQualification.push(`Experience: ${fields.experience_required}`);
    }
    const mse = relaxation(text, p.mseRelaxation);
    if (mse) {
      fields.mse_relaxation = mse;
      preQualification.push(`MSE Relaxation: ${mse}`);
    }
    const startup = relaxation(text, p.startupRelaxation);
    if (startup) {
      fields.startup_relaxation = startup;
      preQualification.push(`Startup Relaxation: ${startup}`);
    }
    if (preQualification.length > 0) {
      fields.pre_qualification_requirement = preQualification.join(' | ');
    }

    const sellerDocuments = capture(text, p.sellerDocuments);
    if (sellerDocuments) {
      const documents = sellerDocuments
        .split(/[,•\n]/)
        .map((doc) => doc.trim())
        .filter((doc) => doc.length > 2);
      if (documents.length > 0) fields.documents_required = documents;
    }

    const evaluation = capture(text, p.evaluationMethod);
    if (evaluation) fields.evaluation_method = evaluation;
    const bidToRa = capture(text, p.bidToRa);
    if (bidToRa) fields.bid_to_ra_enabled = bidToRa;
    const clarification = capture(text, p.clarificationTime);
    if (clarification) fields.technical_clarification_time = clarification;
    const buyerAtc = capture(text, p.buyerAtc);
    if (buyerAtc) fields.buyer_added_atc = buyerAtc;

    return fields;
  }

  extractCppp(text: string): PreExtractedFields {
    const fields: PreExtractedFields = {};
    const p = CPPP_PATTERNS;

    const tenderId = capture(text, p.tenderId);
    if (tenderId && isPlausibleId(tenderId)) fields.tender_id = tenderId;

    const issued = capture(text, p.dateOfIssue);
    if (issued) fields.date_and_time_of_issue = issued;
    const due = capture(text, p.dueDateOfSubmission);
    if (due) fields.due_date_and_time_of_submission = due;

    const online = [...new Set([...sectionDocuments(text, p.envelopeOne), ...sectionDocuments(text, p.envelopeTwo)])];
    if (online.length > 0) fields.online_submission_documents = online;
    const offline = [...new Set(sectionDocuments(text, p.offlineSubmission))];
    if (offline.length > 0) fields.offline_submission_documents = offline;

    const infrastructure = [
      ['Computer System', capture(text, p.computerSystem)],
      ['Broadband', capture(text, p.broadband)],
      ['DSC', capture(text, p.dsc)],
    ]
      .filter(([, value]) => value)
      .map(([name, value]) => `${name}: ${value}`);
    if (infrastructure.length > 0) fields.bidder_technical_infrastructure = infrastructure.join(' | ');

    if (p.rightToReject.test(text)) fields.rejection_of_bid = 'Yes';
    if (p.splitWork.test(text)) fields.splitting_of_work = 'Yes';

    return fields;
  }
}

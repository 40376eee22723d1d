/**
 * Pipeline Orchestrator
 *
 * Runs one set of tender documents through
 * CLASSIFY → PRE_EXTRACT → SINGLE_PASS | HIERARCHICAL → GAP_FILL → FINALIZE
 * and returns the cleaned record with its metadata.
 */

import { randomUUID } from 'crypto';
import type { ExtractionClient } from '../concurrent/ExtractionClient.js';
import { FanOutExtractor } from '../concurrent/FanOutExtractor.js';
import { DEFAULT_PIPELINE_SETTINGS, type PipelineSettings } from '../config/pipeline.js';
import { estimateTokens } from '../core/RateBudgetController.js';
import type { DocumentSource } from '../documents/FileDocumentSource.js';
import { buildMicroSummaryPrompt } from '../prompts/hierarchical.js';
import { buildSinglePassPrompt } from '../prompts/singlePass.js';
import type { RuleExtractor } from '../rules/RuleExtractor.js';
import { TenderRuleExtractor } from '../rules/TenderRuleExtractor.js';
import { placeRuleFields } from '../rules/placeRuleFields.js';
import { RunLogger } from '../utils/logger.js';
import { parseExtractionResponse } from '../utils/validators.js';
import { buildCondensedContext, extractCriticalSections, filterRelevantLines, splitToChunks } from './chunkPlanner.js';
import { classify } from './classifier.js';
import { finalStructure, mergeMicroResults, normalizeMicroResult } from './consolidator.js';
import { criticalGaps, deepMerge, refill } from './gapAnalyzer.js';
import { canonicalizeRecord, cleanEmptyFields, loadTenderTemplate, type CanonicalizeResult } from './record.js';
import type {
  CandidateRecord,
  ExtractionStrategy,
  PipelineStage,
  PortalLabel,
  PreExtractedFields,
  ResultEnvelope,
  SourceDocument,
} from './types.js';
import { validateCompleteness } from './validation.js';

// ============================================================================
// Types
// ============================================================================

export interface PipelineOrchestratorOptions {
  client: ExtractionClient;
  settings?: Partial<PipelineSettings>;
  ruleExtractor?: RuleExtractor;
  documentSource?: DocumentSource;
  fanOut?: FanOutExtractor;
  template?: CandidateRecord;
}

export interface PipelineRunResult {
  runId: string;
  envelope: ResultEnvelope;
  /** States entered, in order. */
  stages: PipelineStage[];
  durationMs: number;
}

/** Tokens reserved for the structured answer of a single-pass call. */
export const SINGLE_PASS_RESPONSE_TOKENS = 2000;

/** Tokens reserved for each micro-summary answer. */
export const MICRO_RESPONSE_TOKENS = 1000;

interface ExtractionOutcome extends CanonicalizeResult {
  chunkErrors: number;
}

// ============================================================================
// Pipeline Orchestrator
// ============================================================================

export class PipelineOrchestrator {
  private client: ExtractionClient;
  private settings: PipelineSettings;
  private ruleExtractor: RuleExtractor;
  private documentSource?: DocumentSource;
  private fanOut: FanOutExtractor;
  private template: CandidateRecord;

  constructor(options: PipelineOrchestratorOptions) {
    this.client = options.client;
    this.settings = { ...DEFAULT_PIPELINE_SETTINGS, ...options.settings };
    this.ruleExtractor = options.ruleExtractor ?? new TenderRuleExtractor();
    this.documentSource = options.documentSource;
    this.fanOut = options.fanOut ?? new FanOutExtractor();
    this.template = options.template ?? loadTenderTemplate();
  }

  /**
   * Run the pipeline over `documents`.
   *
   * Unresolved gaps are reported in `_metadata.validation`, not thrown.
   *
   * @throws CapabilityUnavailableError when a required call exhausts its retries
   * @throws MalformedExtractionError when a required answer is not recoverable JSON
   */
  async run(documents: readonly SourceDocument[], runId: string = randomUUID()): Promise<PipelineRunResult> {
    const log = new RunLogger(runId);
    const startedAt = Date.now();
    const stages: PipelineStage[] = [];
    let current: PipelineStage | null = null;

    const enter = (next: PipelineStage, metadata?: object): void => {
      log.stage(current, next, metadata);
      stages.push(next);
      current = next;
    };

    log.started({ documents: documents.map((doc) => doc.id), provider: this.client.capability.name });

    try {
      const sources = await this.withReferences(documents, log);
      const combined = sources.map((doc) => `\n\n=== ${doc.id} ===\n${doc.text}`).join('');
      const estimatedTokens = estimateTokens(combined);

      enter('CLASSIFY');
      const classification = classify(combined);
      log.info(`Classified as ${classification.label}`, { scores: classification.scores });

      enter('PRE_EXTRACT');
      const rules = this.ruleExtractor.extract(combined, classification.label);
      const placed = placeRuleFields(rules.fields, this.template);
      if (placed.unplaced.length > 0) {
        log.debug('Rule fields without a template leaf', { fields: placed.unplaced });
      }
      const seed = canonicalizeRecord(placed.seed, this.template).record;

      const strategy: ExtractionStrategy = estimatedTokens <= this.settings.singlePassTokenLimit ? 'SINGLE_PASS' : 'HIERARCHICAL';
      enter(strategy, { estimatedTokens, ceiling: this.settings.singlePassTokenLimit });

      const extraction =
        strategy === 'SINGLE_PASS'
          ? await this.runSinglePass(combined, rules.fields, classification.label)
          : await this.runHierarchical(combined, rules.fields, log);

      let record: CandidateRecord = deepMerge(seed, extraction.record);
      const coercions = [...extraction.coercions];

      enter('GAP_FILL');
      const gapsBefore = criticalGaps(record);
      let fieldsFilled = 0;
      if (gapsBefore.length > 0) {
        const refilled = await refill(this.client, record, gapsBefore, sources, {
          maxDocChars: this.settings.gapFillDocChars,
          template: this.template,
        });
        record = refilled.record;
        coercions.push(...refilled.coercions);
        fieldsFilled = gapsBefore.length - criticalGaps(record).length;
        log.info(`Gap fill resolved ${fieldsFilled} of ${gapsBefore.length} critical gaps`);
      }

      enter('FINALIZE');
      const validation = validateCompleteness(record, classification.label);
      const envelope: ResultEnvelope = {
        record: cleanEmptyFields(record),
        _metadata: {
          document_type: classification.label,
          files_processed: documents.map((doc) => doc.id),
          estimated_tokens: estimatedTokens,
          fields_filled_by_refill: fieldsFilled,
          strategy,
          chunk_errors: extraction.chunkErrors,
          coercion_warnings: coercions.map((coercion) => coercion.message),
          validation,
        },
      };

      const durationMs = Date.now() - startedAt;
      log.completed({
        strategy,
        durationMs,
        isValid: validation.isValid,
        missingFields: validation.summary.missingFieldsCount,
      });

      return { runId, envelope, stages, durationMs };
    } catch (error) {
      log.failed(error, { stage: current });
      throw error;
    }
  }

  /**
   * Append the first document's resolvable references to its text.
   */
  private async withReferences(documents: readonly SourceDocument[], log: RunLogger): Promise<SourceDocument[]> {
    const [primary, ...rest] = documents;
    const resolver = this.documentSource;
    if (!primary || primary.references.length === 0 || !resolver?.resolveReference) {
      return [...documents];
    }

    let text = primary.text;
    for (const reference of primary.references) {
      const resolved = await resolver.resolveReference(reference);
      if (resolved) {
        text += `\n\n=== External: ${resolved.id} ===\n${resolved.text}`;
        log.info(`Merged reference ${reference}`, { chars: resolved.text.length });
      }
    }

    return [{ ...primary, text }, ...rest];
  }

  private async runSinglePass(
    combined: string,
    preExtracted: PreExtractedFields,
    label: PortalLabel
  ): Promise<ExtractionOutcome> {
    const context = buildCondensedContext(
      combined,
      preExtracted,
      extractCriticalSections(combined),
      this.settings.contextTokenBudget
    );
    const prompt = buildSinglePassPrompt(
      label,
      JSON.stringify(this.template, null, 2),
      JSON.stringify(preExtracted, null, 2),
      context
    );

    const raw = await this.client.callRequired(prompt, {
      label: 'single pass',
      responseTokens: SINGLE_PASS_RESPONSE_TOKENS,
    });

    return { ...canonicalizeRecord(parseExtractionResponse(raw), this.template), chunkErrors: 0 };
  }

  private async runHierarchical(
    combined: string,
    preExtracted: PreExtractedFields,
    log: RunLogger
  ): Promise<ExtractionOutcome> {
    const chunks = splitToChunks(filterRelevantLines(combined), this.settings.chunkSizeChars);
    log.info(`Processing large document in ${chunks.length} chunks`);

    const fanOut = await this.fanOut.extractAll(
      chunks,
      async (chunk) => {
        const result = await this.client.call(buildMicroSummaryPrompt(chunk.text), {
          label: `chunk ${chunk.index + 1}`,
          responseTokens: MICRO_RESPONSE_TOKENS,
        });
        if (!result.ok) throw result.error;
        return normalizeMicroResult(result.value);
      },
      { maxConcurrency: this.settings.fanOutConcurrency }
    );

    if (fanOut.failed > 0) {
      log.warn(`${fanOut.failed} of ${chunks.length} chunks failed, merging partial results`);
    }

    const merged = mergeMicroResults(fanOut.results, preExtracted, {
      maxChars: this.settings.mergeContextMaxChars,
    });
    const structured = await finalStructure(this.client, merged.context, this.template);

    return { ...structured, chunkErrors: fanOut.failed };
  }
}

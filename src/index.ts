/**
 * Tender extraction pipeline: public exports
 */

export * from './errors.js';
export * from './pipeline/types.js';

export { PipelineConfig, DEFAULT_PIPELINE_SETTINGS } from './config/pipeline.js';
export type { PipelineSettings, ExtractionProvider } from './config/pipeline.js';
export { OpenAIConfig } from './config/openai.js';
export { AnthropicConfig } from './config/anthropic.js';

export { RateBudgetController, TokenBucket, estimateTokens, systemClock } from './core/RateBudgetController.js';
export type { Clock, RateBudgetOptions, RateBudgetSnapshot } from './core/RateBudgetController.js';
export { RetryPolicy } from './core/RetryPolicy.js';
export type { RetryPolicyOptions, RetryResult } from './core/RetryPolicy.js';
export * from './core/providers/index.js';

export { ExtractionClient } from './concurrent/ExtractionClient.js';
export type { ExtractionCallOptions } from './concurrent/ExtractionClient.js';
export { FanOutExtractor, chunkErrorMarker, isChunkErrorMarker } from './concurrent/FanOutExtractor.js';
export type { ChunkExtractFn, FanOutOptions, FanOutResult } from './concurrent/FanOutExtractor.js';

export { FileDocumentSource, decodeHtml } from './documents/FileDocumentSource.js';
export type { DocumentSource } from './documents/FileDocumentSource.js';

export type { RuleExtractor } from './rules/RuleExtractor.js';
export { TenderRuleExtractor } from './rules/TenderRuleExtractor.js';
export { placeRuleFields } from './rules/placeRuleFields.js';

export { classify, loadIndicatorTable } from './pipeline/classifier.js';
export type { IndicatorTable } from './pipeline/classifier.js';
export {
  splitToChunks,
  filterRelevantLines,
  extractCriticalSections,
  buildCondensedContext,
} from './pipeline/chunkPlanner.js';
export { mergeMicroResults, normalizeMicroResult, finalStructure } from './pipeline/consolidator.js';
export {
  isEmptyValue,
  scanForGaps,
  criticalGaps,
  summarizeGaps,
  deepMerge,
  refill,
  loadCriticalFields,
} from './pipeline/gapAnalyzer.js';
export { canonicalizeRecord, cleanEmptyFields, loadTenderTemplate, isCanonicalRecord } from './pipeline/record.js';
export { validateCompleteness } from './pipeline/validation.js';
export { PipelineOrchestrator } from './pipeline/PipelineOrchestrator.js';
export type { PipelineOrchestratorOptions, PipelineRunResult } from './pipeline/PipelineOrchestrator.js';
export { createPipeline } from './pipeline/createPipeline.js';
export type { PipelineComponents } from './pipeline/createPipeline.js';

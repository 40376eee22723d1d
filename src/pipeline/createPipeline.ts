import { ExtractionClient } from '../concurrent/ExtractionClient.js';
import { FanOutExtractor } from '../concurrent/FanOutExtractor.js';
import type { PipelineSettings } from '../config/pipeline.js';
import { RateBudgetController } from '../core/RateBudgetController.js';
import { RetryPolicy } from '../core/RetryPolicy.js';
import { CapabilityFactory } from '../core/providers/CapabilityFactory.js';
import type { CapabilityCallSettings, ExtractionCapability } from '../core/providers/ExtractionCapability.js';
import { FileDocumentSource } from '../documents/FileDocumentSource.js';
import { PipelineOrchestrator } from './PipelineOrchestrator.js';

export interface PipelineComponents {
  orchestrator: PipelineOrchestrator;
  client: ExtractionClient;
  rateBudget: RateBudgetController;
  documentSource: FileDocumentSource;
}

/**
 * Wire one process's pipeline from settings. A single RateBudgetController
 * is shared by every call the orchestrator makes.
 *
 * Pass `capability` to bypass the provider factory.
 */
export function createPipeline(
  settings: PipelineSettings,
  options: { capability?: ExtractionCapability; callSettings?: CapabilityCallSettings } = {}
): PipelineComponents {
  const capability = options.capability ?? CapabilityFactory.createCapability(settings.provider, options.callSettings);

  const rateBudget = new RateBudgetController({
    requestsPerMinute: settings.requestsPerMinute,
    tokensPerMinute: settings.tokensPerMinute,
  });
  const retryPolicy = new RetryPolicy({
    maxAttempts: settings.retryMaxAttempts,
    baseDelayMs: settings.retryBaseDelayMs,
    rateLimitPenaltyMs: settings.rateLimitPenaltyMs,
    provider: capability.name,
  });
  const client = new ExtractionClient(capability, rateBudget, retryPolicy);
  const documentSource = new FileDocumentSource();

  const orchestrator = new PipelineOrchestrator({
    client,
    settings,
    documentSource,
    fanOut: new FanOutExtractor(),
  });

  return { orchestrator, client, rateBudget, documentSource };
}

/**
 * Extraction Capability Exports
 *
 * Central export point for all capability implementations
 */

export type { ExtractionCapability, CapabilityCallSettings } from './ExtractionCapability.js';
export { EXTRACTION_SYSTEM_PROMPT, DEFAULT_CALL_SETTINGS } from './ExtractionCapability.js';
export { OpenAICapability } from './OpenAICapability.js';
export { ClaudeCapability } from './ClaudeCapability.js';
export { CapabilityFactory } from './CapabilityFactory.js';

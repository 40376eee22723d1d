#!/usr/bin/env node

import fs from 'fs/promises';
import path from 'path';
import { AnthropicConfig } from './config/anthropic.js';
import { OpenAIConfig } from './config/openai.js';
import { PipelineConfig } from './config/pipeline.js';
import { CapabilityFactory } from './core/providers/CapabilityFactory.js';
import { FileDocumentSource } from './documents/FileDocumentSource.js';
import { classify } from './pipeline/classifier.js';
import { createPipeline } from './pipeline/createPipeline.js';
import { summarizeGaps } from './pipeline/gapAnalyzer.js';
import { canonicalizeRecord } from './pipeline/record.js';
import { logger } from './utils/logger.js';
import { parseExtractionResponse } from './utils/validators.js';

/**
 * CLI for Tender Document Extraction
 *
 * Usage:
 *   npm run dev process <file...> [--out <path>]   - Extract one record from the files
 *   npm run dev classify <file>                     - Show the portal classification
 *   npm run dev gaps <record.json>                  - List empty fields of a saved record
 *   npm run dev test-connections                    - Check provider configuration
 */

const COMMANDS = ['process', 'classify', 'gaps', 'test-connections', 'help'];

const DEFAULT_OUTPUT_DIR = 'output';

function takeOption(args: string[], name: string): { value?: string; rest: string[] } {
  const index = args.indexOf(name);
  if (index === -1) return { rest: args };
  const value = args[index + 1];
  if (value === undefined) {
    throw new Error(`${name} requires a value`);
  }
  return { value, rest: [...args.slice(0, index), ...args.slice(index + 2)] };
}

/**
 * Run the full pipeline over the given files and write the envelope
 */
async function processFiles(files: string[], outPath?: string): Promise<void> {
  const settings = PipelineConfig.load();

  // Reset client caches to pick up any .env changes
  OpenAIConfig.resetClient();
  AnthropicConfig.resetClient();

  const { orchestrator, documentSource } = createPipeline(settings);
  const documents = await Promise.all(files.map((file) => documentSource.load(file)));
  const { runId, envelope, durationMs } = await orchestrator.run(documents);

  const target =
    outPath ?? path.join(DEFAULT_OUTPUT_DIR, `${path.parse(files[0] ?? runId).name}-${runId.slice(0, 8)}.json`);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, JSON.stringify(envelope, null, 2), 'utf-8');

  const meta = envelope._metadata;
  console.log('\n✅ Extraction complete\n');
  console.log(`   Document type:   ${meta.document_type}`);
  console.log(`   Strategy:        ${meta.strategy}`);
  console.log(`   Est. tokens:     ${meta.estimated_tokens}`);
  console.log(`   Refilled fields: ${meta.fields_filled_by_refill}`);
  if (meta.chunk_errors > 0) {
    console.log(`   Chunk errors:    ${meta.chunk_errors}`);
  }
  console.log(`   Valid:           ${meta.validation.isValid ? 'yes' : 'no'}`);
  for (const warning of meta.validation.warnings) {
    console.log(`   ⚠️  ${warning}`);
  }
  console.log(`   Duration:        ${(durationMs / 1000).toFixed(1)}s`);
  console.log(`   Output:          ${target}\n`);
}

async function classifyFile(file: string): Promise<void> {
  const document = await new FileDocumentSource().load(file);
  const result = classify(document.text);

  console.log(`\n📄 ${document.id}: ${result.label}`);
  for (const [label, score] of Object.entries(result.scores)) {
    console.log(`   ${label}: ${score}`);
  }
  console.log('');
}

/**
 * Report empty fields of a saved record (or result envelope)
 */
async function reportGaps(file: string): Promise<void> {
  const parsed = parseExtractionResponse(await fs.readFile(file, 'utf-8'));
  const { record } = canonicalizeRecord(parsed.record ?? parsed);
  const summary = summarizeGaps(record);

  console.log(`\n🔍 ${path.basename(file)}`);
  console.log(`   Missing fields:  ${summary.totalMissing}`);
  console.log(`   Critical:        ${summary.criticalMissing}`);
  for (const [section, count] of Object.entries(summary.bySection)) {
    console.log(`   - ${section}: ${count}`);
  }
  console.log('');
}

async function testConnections(): Promise<void> {
  console.log('\n🧪 Testing provider configuration...\n');

  const settings = PipelineConfig.load();
  console.log(`Selected provider: ${settings.provider}\n`);

  const openaiOk = OpenAIConfig.validate();
  console.log(openaiOk ? '✅ OpenAI configuration valid\n' : '⚠️  OpenAI configuration invalid\n');

  const anthropicOk = AnthropicConfig.validate();
  console.log(anthropicOk ? '✅ Anthropic configuration valid\n' : '⚠️  Anthropic configuration invalid\n');

  if (!CapabilityFactory.validateProvider(settings.provider)) {
    console.log(`❌ The selected provider (${settings.provider}) is not configured. Please check your .env file.`);
    process.exitCode = 1;
    return;
  }

  console.log('✅ Selected provider is ready');
}

function printHelp(): void {
  console.log(`
Tender Document Extraction

Turns tender documents (text, markdown, HTML) into one structured record
using deterministic rules plus an LLM extraction capability.

USAGE:
  npm run dev <command> [options]

COMMANDS:
  process <file...>              Extract one record from the files
  process <file...> --out <path> Write the result envelope to <path>
  classify <file>                Show the portal classification scores
  gaps <record.json>             List empty and critical fields of a saved record
  test-connections               Check provider configuration
  help                           Show this help message

EXAMPLES:
  npm run dev process tenders/notice.html tenders/annexure.txt
  npm run dev process tenders/bid.md --out results/bid.json
  npm run dev classify tenders/notice.html
  npm run dev gaps results/bid.json

ENVIRONMENT:
  Configuration is loaded from .env file
    - EXTRACTION_PROVIDER          openai (default) | anthropic
    - OPENAI_API_KEY, OPENAI_MODEL, OPENAI_BASE_URL
    - ANTHROPIC_API_KEY, ANTHROPIC_MODEL
    - RATE_LIMIT_RPM, RATE_LIMIT_TPM
    - SINGLE_PASS_TOKEN_LIMIT, CHUNK_SIZE_CHARS, FANOUT_CONCURRENCY
    - LOG_LEVEL, LOG_TO_FILE
`);
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === 'help') {
    printHelp();
    return;
  }

  const [command, ...rest] = args;

  try {
    switch (command) {
      case 'process': {
        const { value: outPath, rest: files } = takeOption(rest, '--out');
        if (files.length === 0) {
          console.error('Error: At least one file is required');
          console.error('Usage: npm run dev process <file...> [--out <path>]');
          process.exitCode = 1;
          return;
        }
        await processFiles(files, outPath);
        break;
      }

      case 'classify': {
        const file = rest[0];
        if (!file) {
          console.error('Error: File is required');
          console.error('Usage: npm run dev classify <file>');
          process.exitCode = 1;
          return;
        }
        await classifyFile(file);
        break;
      }

      case 'gaps': {
        const file = rest[0];
        if (!file) {
          console.error('Error: Record file is required');
          console.error('Usage: npm run dev gaps <record.json>');
          process.exitCode = 1;
          return;
        }
        await reportGaps(file);
        break;
      }

      case 'test-connections':
        await testConnections();
        break;

      default:
        console.error(`Unknown command: ${command}`);
        console.error(`Valid commands: ${COMMANDS.join(', ')}`);
        printHelp();
        process.exitCode = 1;
    }
  } catch (error) {
    logger.error('Command failed', { error: error instanceof Error ? error.message : String(error) });
    console.error('\n❌ Command failed:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

await main();

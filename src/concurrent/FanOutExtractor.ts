import pLimit from 'p-limit';
import type { Chunk } from '../pipeline/types.js';
import { createLogger } from '../utils/logger.js';

export type ChunkExtractFn = (chunk: Chunk) => Promise<string>;

export interface FanOutOptions {
  /** Maximum calls in flight at once. */
  maxConcurrency?: number;
}

export interface FanOutResult {
  /** One entry per input chunk, in input order. */
  results: string[];
  succeeded: number;
  failed: number;
}

export const DEFAULT_FANOUT_CONCURRENCY = 20;

/**
 * Marker that replaces the partial result of a chunk whose call failed.
 * Numbered from 1 to match the `--- CHUNK <n> ---` merge sections.
 */
export function chunkErrorMarker(chunk: Chunk, error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `[CHUNK ${chunk.index + 1} ERROR] ${message}`;
}

export function isChunkErrorMarker(result: string): boolean {
  return /^\[CHUNK \d+ ERROR\] /.test(result);
}

/**
 * Fan-Out Extractor
 *
 * Runs one extraction call per chunk under a concurrency ceiling. A failing
 * chunk never cancels its siblings; its slot holds an error marker instead.
 * Resolves once every call has settled.
 */
export class FanOutExtractor {
  private logger = createLogger('FanOutExtractor');

  async extractAll(chunks: readonly Chunk[], extractFn: ChunkExtractFn, options: FanOutOptions = {}): Promise<FanOutResult> {
    const maxConcurrency = Math.max(1, options.maxConcurrency ?? DEFAULT_FANOUT_CONCURRENCY);
    const limit = pLimit(maxConcurrency);
    const total = chunks.length;
    let completed = 0;
    let failed = 0;

    this.logger.info(`Extracting ${total} chunks`, { maxConcurrency });

    const results = await Promise.all(
      chunks.map((chunk) =>
        limit(async () => {
          let result: string;
          try {
            result = await extractFn(chunk);
          } catch (error) {
            failed++;
            this.logger.warn(`Chunk ${chunk.index + 1} failed`, {
              error: error instanceof Error ? error.message : String(error),
            });
            result = chunkErrorMarker(chunk, error);
          }

          completed++;
          if (completed % 10 === 0 || completed === total) {
            this.logger.info(`Progress: ${completed}/${total} chunks settled`);
          }
          return result;
        })
      )
    );

    return { results, succeeded: total - failed, failed };
  }
}

import fs from 'fs/promises';
import path from 'path';
import * as cheerio from 'cheerio';
import { ExtractionError } from '../errors.js';
import type { SourceDocument } from '../pipeline/types.js';
import { createLogger } from '../utils/logger.js';

/**
 * Document Source Interface
 *
 * Decodes raw inputs into text plus the external references found in them.
 * `resolveReference` is optional: without it references are reported but
 * never merged.
 */
export interface DocumentSource {
  load(location: string): Promise<SourceDocument>;
  resolveReference?(reference: string): Promise<SourceDocument | null>;
}

const TEXT_EXTENSIONS = new Set(['.txt', '.md', '.text']);
const HTML_EXTENSIONS = new Set(['.html', '.htm']);
const REFERENCE_PATTERN = /\.(?:pdf|html?|txt|md)(?:[?#].*)?$/i;

// Elements whose text ends a line in the decoded output
const BLOCK_SELECTOR = 'p, div, li, tr, h1, h2, h3, h4, h5, h6, table, section, article, br, dt, dd';

export function isRemoteReference(reference: string): boolean {
  return /^https?:\/\//i.test(reference);
}

/**
 * Collapse horizontal whitespace, trim every line and keep at most one
 * blank line in a row.
 */
export function normalizeWhitespace(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t\u00a0]+/g, ' ')
    .split('\n')
    .map((line) => line.trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Decode HTML to text. Table cells are separated by " | " so label/value
 * rows stay on one line.
 */
export function decodeHtml(html: string): { text: string; links: string[] } {
  const $ = cheerio.load(html);
  $('script, style, noscript').remove();

  const links: string[] = [];
  $('a[href]').each((_, el) => {
    const href = $(el).attr('href');
    if (href && REFERENCE_PATTERN.test(href)) links.push(href);
  });

  $('td, th').each((_, el) => {
    $(el).append(' | ');
  });
  $(BLOCK_SELECTOR).each((_, el) => {
    $(el).append('\n');
  });

  const body = $('body');
  const text = (body.length > 0 ? body.text() : $.root().text()).replace(/ \| \n/g, '\n');
  return { text: normalizeWhitespace(text), links: [...new Set(links)] };
}

/**
 * File Document Source
 *
 * Reads .txt/.md files verbatim and .html files through cheerio. Binary
 * formats are rejected. Local references resolve relative to the file that
 * links them; remote ones are listed but not fetched.
 */
export class FileDocumentSource implements DocumentSource {
  private logger = createLogger('FileDocumentSource');

  async load(location: string): Promise<SourceDocument> {
    const extension = path.extname(location).toLowerCase();
    const id = path.basename(location);

    if (TEXT_EXTENSIONS.has(extension)) {
      const text = await fs.readFile(location, 'utf-8');
      const references = [...new Set(text.match(/https?:\/\/\S+?\.pdf\b/gi) ?? [])];
      return { id, text, references };
    }

    if (HTML_EXTENSIONS.has(extension)) {
      const html = await fs.readFile(location, 'utf-8');
      const { text, links } = decodeHtml(html);
      const baseDir = path.dirname(location);
      const references = links.map((link) => (isRemoteReference(link) ? link : path.resolve(baseDir, link)));

      this.logger.debug(`Decoded ${id}`, { chars: text.length, references: references.length });
      return { id, text, references };
    }

    throw new ExtractionError(`Unsupported document type "${extension || 'none'}" for ${location}`, 'configuration', {
      details: { location, supported: [...TEXT_EXTENSIONS, ...HTML_EXTENSIONS] },
    });
  }

  async resolveReference(reference: string): Promise<SourceDocument | null> {
    if (isRemoteReference(reference)) {
      this.logger.warn(`Skipping remote reference ${reference}`);
      return null;
    }

    const extension = path.extname(reference).toLowerCase();
    if (!TEXT_EXTENSIONS.has(extension) && !HTML_EXTENSIONS.has(extension)) {
      this.logger.warn(`Skipping reference with unsupported type ${reference}`);
      return null;
    }

    try {
      return await this.load(reference);
    } catch (error) {
      this.logger.warn(`Failed to read reference ${reference}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}

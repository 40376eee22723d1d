import { readValidatedDataFile } from '../utils/dataFiles.js';
import type { ClassificationScore, PortalLabel } from './types.js';

/**
 * Document-Type Classifier
 *
 * Weighted indicator phrases per portal, matched case-insensitively as
 * substrings. Pure: no capability calls.
 */

type ScoredLabel = Exclude<PortalLabel, 'Generic'>;

export interface IndicatorTable {
  fallbackLabel: 'Generic';
  minimumScore: number;
  labels: Record<ScoredLabel, Record<string, number>>;
}

const INDICATOR_FILE_SCHEMA = {
  type: 'object',
  required: ['fallbackLabel', 'minimumScore', 'labels'],
  properties: {
    fallbackLabel: { const: 'Generic' },
    minimumScore: { type: 'number', minimum: 0 },
    labels: {
      type: 'object',
      required: ['GeM', 'CPPP'],
      additionalProperties: false,
      properties: {
        GeM: { type: 'object', additionalProperties: { type: 'number' } },
        CPPP: { type: 'object', additionalProperties: { type: 'number' } },
      },
    },
  },
};

function isWeightMap(value: unknown): value is Record<string, number> {
  return typeof value === 'object' && value !== null && Object.values(value).every((weight) => typeof weight === 'number');
}

function isIndicatorTable(value: unknown): value is IndicatorTable {
  if (typeof value !== 'object' || value === null) return false;
  const labels: unknown = Reflect.get(value, 'labels');
  return (
    Reflect.get(value, 'fallbackLabel') === 'Generic' &&
    typeof Reflect.get(value, 'minimumScore') === 'number' &&
    typeof labels === 'object' &&
    labels !== null &&
    isWeightMap(Reflect.get(labels, 'GeM')) &&
    isWeightMap(Reflect.get(labels, 'CPPP'))
  );
}

let cachedTable: IndicatorTable | null = null;

export function loadIndicatorTable(): IndicatorTable {
  if (!cachedTable) {
    cachedTable = readValidatedDataFile('portal-indicators.json', INDICATOR_FILE_SCHEMA, isIndicatorTable);
  }
  return cachedTable;
}

function scoreLabel(lowerText: string, indicators: Record<string, number>): number {
  let score = 0;
  for (const [phrase, weight] of Object.entries(indicators)) {
    if (lowerText.includes(phrase)) score += weight;
  }
  return score;
}

/**
 * Label a document by its indicator scores. The top label wins only when
 * its score is strictly greater than every other label's and reaches the
 * minimum; otherwise the document is Generic.
 */
export function classify(text: string, table: IndicatorTable = loadIndicatorTable()): ClassificationScore {
  const lowerText = text.toLowerCase();
  const scores: Record<string, number> = {};
  let best: ScoredLabel | null = null;
  let bestScore = -1;
  let tied = false;

  for (const label of ['GeM', 'CPPP'] as const) {
    const score = scoreLabel(lowerText, table.labels[label]);
    scores[label] = score;

    if (score > bestScore) {
      best = label;
      bestScore = score;
      tied = false;
    } else if (score === bestScore) {
      tied = true;
    }
  }

  const label: PortalLabel = best !== null && !tied && bestScore >= table.minimumScore ? best : table.fallbackLabel;
  return { label, scores };
}

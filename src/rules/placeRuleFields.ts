import { isRecordSection } from '../pipeline/record.js';
import type { CandidateRecord, PreExtractedFields, RecordSection } from '../pipeline/types.js';

export interface PlacedRuleFields {
  /** Partial record holding only the placed values. */
  seed: CandidateRecord;
  /** Rule fields with no leaf of that name in the template. */
  unplaced: string[];
}

type LeafLocation = { section: string | null; isList: boolean };

function indexLeaves(template: RecordSection): Map<string, LeafLocation> {
  const index = new Map<string, LeafLocation>();

  for (const [key, value] of Object.entries(template)) {
    if (isRecordSection(value)) {
      for (const [field, shape] of Object.entries(value)) {
        if (!isRecordSection(shape) && !index.has(field)) {
          index.set(field, { section: key, isList: Array.isArray(shape) });
        }
      }
    } else if (!index.has(key)) {
      index.set(key, { section: null, isList: Array.isArray(value) });
    }
  }

  return index;
}

/**
 * Put flat rule fields into their template sections, matching on field
 * name. Values take the leaf's shape: lists are joined with "; " for string
 * fields and strings are wrapped for list fields.
 */
export function placeRuleFields(fields: PreExtractedFields, template: CandidateRecord): PlacedRuleFields {
  const index = indexLeaves(template);
  const seed: CandidateRecord = {};
  const unplaced: string[] = [];

  for (const [name, raw] of Object.entries(fields)) {
    const location = index.get(name);
    if (!location) {
      unplaced.push(name);
      continue;
    }

    const value = location.isList
      ? typeof raw === 'string' ? [raw] : [...raw]
      : typeof raw === 'string' ? raw : raw.join('; ');

    if (location.section === null) {
      seed[name] = value;
      continue;
    }

    const existing = seed[location.section];
    const section: RecordSection = isRecordSection(existing) ? existing : {};
    section[name] = value;
    seed[location.section] = section;
  }

  return { seed, unplaced };
}

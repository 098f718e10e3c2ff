/**
 * Merge Engine
 *
 * Folds each scraped record with its matched standard and historical
 * records. For every field the first present value in the priority
 * order wins; any other present value that differs is kept as a
 * field-disagreement conflict.
 *
 * @module merge/merge-engine
 */

import type {
  CandidateRecord,
  CandidateSource,
  FieldDisagreementConflict,
  RegionField,
  RegionRecord,
  SourceId,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { DEFAULT_PRIORITY, type FieldPriorityTable } from './priority.js';

const logger = createLogger({ module: 'merge' });

/**
 * Matched candidates per source, keyed by scraped code
 */
export type SourceMatches = Partial<Record<CandidateSource, ReadonlyMap<number, CandidateRecord>>>;

export interface MergeOptions {
  /** Candidates without a scraped match */
  readonly unmatched?: readonly CandidateRecord[];
  /** Append unmatched candidates that carry a new canonical code */
  readonly includeUnmatched?: boolean;
}

export interface MergeResult {
  /** Merged records sorted by code */
  readonly records: readonly RegionRecord[];
  readonly conflicts: readonly FieldDisagreementConflict[];
}

interface FieldSources {
  readonly scraped: RegionRecord;
  readonly standard?: CandidateRecord;
  readonly historical?: CandidateRecord;
}

type FieldValue = string | number;

/**
 * Pick the winning value of one field and note every disagreement
 */
function resolveField<T extends FieldValue>(
  code: number,
  field: RegionField,
  order: readonly SourceId[],
  valueFrom: (source: SourceId) => T | undefined,
  conflicts: FieldDisagreementConflict[]
): T | undefined {
  let chosen: { source: SourceId; value: T } | undefined;

  for (const source of order) {
    const value = valueFrom(source);
    if (value === undefined) continue;

    if (chosen === undefined) {
      chosen = { source, value };
    } else if (chosen.value !== value) {
      conflicts.push({
        kind: 'field-disagreement',
        code,
        field,
        chosen,
        rejected: { source, value },
      });
    }
  }

  return chosen?.value;
}

/**
 * Merge one scraped record with its matches
 */
export function mergeRecord(
  sources: FieldSources,
  priority: FieldPriorityTable,
  conflicts: FieldDisagreementConflict[]
): RegionRecord {
  const { scraped } = sources;
  const recordFor = (source: SourceId): RegionRecord | CandidateRecord | undefined =>
    sources[source];

  const resolve = <T extends FieldValue>(
    field: RegionField,
    valueFrom: (record: RegionRecord | CandidateRecord) => T | null | undefined
  ): T | undefined =>
    resolveField(
      scraped.code,
      field,
      priority[field],
      (source) => {
        const record = recordFor(source);
        return record === undefined ? undefined : valueFrom(record) ?? undefined;
      },
      conflicts
    );

  return {
    code: resolve('code', (record) => record.code) ?? scraped.code,
    nameZh: resolve('nameZh', (record) => record.nameZh) ?? scraped.nameZh,
    level: resolve('level', (record) => record.level) ?? scraped.level,
    namePinyin: resolve('namePinyin', (record) => record.namePinyin),
    nameEn: resolve('nameEn', (record) => record.nameEn),
    alpha: resolve('alpha', (record) => record.alpha),
    latitude: resolve('latitude', (record) => record.latitude),
    longitude: resolve('longitude', (record) => record.longitude),
  };
}

/**
 * Unmatched candidate shaped as a record, when it has a canonical code
 */
function candidateAsRecord(candidate: CandidateRecord): RegionRecord | null {
  if (candidate.code === null) return null;
  return {
    code: candidate.code,
    nameZh: candidate.nameZh,
    level: candidate.level,
    namePinyin: candidate.namePinyin,
    nameEn: candidate.nameEn,
    alpha: candidate.alpha,
    latitude: candidate.latitude,
    longitude: candidate.longitude,
  };
}

/**
 * Merge every scraped record with the matched sources
 *
 * Output holds one record per scraped record. Unmatched candidates are
 * only appended when asked, and only for codes not already present.
 */
export function mergeDataset(
  scraped: readonly RegionRecord[],
  matches: SourceMatches,
  priority: FieldPriorityTable = DEFAULT_PRIORITY,
  options: MergeOptions = {}
): MergeResult {
  const conflicts: FieldDisagreementConflict[] = [];
  const records = new Map<number, RegionRecord>();

  for (const record of scraped) {
    const merged = mergeRecord(
      {
        scraped: record,
        standard: matches.standard?.get(record.code),
        historical: matches.historical?.get(record.code),
      },
      priority,
      conflicts
    );
    records.set(merged.code, merged);
  }

  let appended = 0;
  if (options.includeUnmatched) {
    for (const candidate of options.unmatched ?? []) {
      const record = candidateAsRecord(candidate);
      if (record === null || records.has(record.code)) continue;
      records.set(record.code, record);
      appended++;
    }
  }

  for (const conflict of conflicts) {
    logger.warn('Sources disagree', {
      code: conflict.code,
      field: conflict.field,
      chosen: `${conflict.chosen.source}=${conflict.chosen.value}`,
      rejected: `${conflict.rejected.source}=${conflict.rejected.value}`,
    });
  }

  logger.info('Merged dataset', {
    records: records.size,
    appendedUnmatched: appended,
    conflicts: conflicts.length,
  });

  return {
    records: Array.from(records.values()).sort((a, b) => a.code - b.code),
    conflicts,
  };
}

/**
 * Post-merge corrections
 *
 * @module merge/corrections
 */

import type { RegionRecord } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import type { PartialRecordRow } from '../parsers/standard-csv.js';

const logger = createLogger({ module: 'corrections' });

export interface CorrectionOutcome {
  readonly records: readonly RegionRecord[];
  readonly applied: number;
  /** Correction codes with no merged record */
  readonly ignored: readonly number[];
}

/**
 * Overlay present correction fields on the merged records
 *
 * Corrections outrank every source. A correction for a code that is not
 * in the dataset is logged and skipped.
 */
export function applyCorrections(
  records: readonly RegionRecord[],
  corrections: readonly PartialRecordRow[]
): CorrectionOutcome {
  const byCode = new Map(corrections.map((correction) => [correction.code, correction]));
  const known = new Set(records.map((record) => record.code));
  let applied = 0;

  const corrected = records.map((record): RegionRecord => {
    const patch = byCode.get(record.code);
    if (!patch) return record;

    applied++;
    return {
      code: record.code,
      nameZh: patch.nameZh ?? record.nameZh,
      level: patch.level ?? record.level,
      namePinyin: patch.namePinyin ?? record.namePinyin,
      nameEn: patch.nameEn ?? record.nameEn,
      alpha: patch.alpha ?? record.alpha,
      latitude: patch.latitude ?? record.latitude,
      longitude: patch.longitude ?? record.longitude,
    };
  });

  const ignored = corrections.map((correction) => correction.code).filter((code) => !known.has(code));
  for (const code of ignored) {
    logger.warn('Correction for unknown code ignored', { code });
  }
  if (applied > 0) {
    logger.info('Applied corrections', { applied });
  }

  return { records: corrected, applied, ignored };
}

/**
 * Historical (CITAS 1982-1992) CSV parser
 *
 * Rows carry a legacy code, a Chinese name, a pinyin spelling and a
 * romanized local name (`N-local`, read as the English name). The
 * legacy code is translated to the six-digit scheme where that can be
 * done without guessing; otherwise only the parent prefix is kept and
 * the row waits for name matching.
 *
 * @module parsers/historical-csv
 */

import { z } from 'zod';
import { isValidCode, levelOfCode, parentPrefix } from '../core/codes.js';
import { ParseError } from '../core/errors.js';
import {
  isAdminLevel,
  type AdminLevel,
  type CandidateRecord,
  type ParseIssue,
  type ParseResult,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import {
  OptionalAlpha,
  OptionalText,
  parseCsv,
  pickCell,
  readCsvFile,
  rowLocation,
  toIssue,
  zodToParseError,
  type CsvRow,
} from './csv.js';

const logger = createLogger({ module: 'historical-csv' });

/**
 * Accepted header names, plain first, CITAS second
 */
export const HISTORICAL_HEADERS = {
  legacyCode: ['legacy_code', 'C-gbcode'],
  nameZh: ['name_zh', 'N-hanzi'],
  namePinyin: ['name_pinyin', 'N-pinyin'],
  nameEn: ['name_en', 'N-local'],
  alpha: ['alpha'],
  todate: ['todate'],
} as const;

export interface HistoricalParseOptions {
  /**
   * Keep only rows whose `todate` equals this value (when the column
   * exists). Null keeps every row.
   */
  readonly todate: string | null;
}

/**
 * Result of translating a legacy identifier
 */
export type LegacyCode =
  | { readonly kind: 'canonical'; readonly code: number }
  | { readonly kind: 'partial'; readonly prefix: string; readonly level: AdminLevel };

/**
 * Translate a legacy code to the six-digit scheme
 *
 * - `110108`, `11-01-08`, `110108.0` → canonical 110108
 * - `11` → 110000, `1101` → 110100 (abbreviated province / prefecture)
 * - `1101xx`, `11****` → partial, parent prefix `1101` / `11`
 *
 * @returns null when the value is not a recognizable code, or when its
 *   province group is zero
 */
export function translateLegacyCode(raw: string): LegacyCode | null {
  const cleaned = raw.trim().replace(/\.0$/, '').replace(/[\s.-]/g, '');

  if (/^\d{6}$/.test(cleaned)) {
    return canonical(Number(cleaned));
  }
  if (/^\d{2}$/.test(cleaned)) {
    return canonical(Number(cleaned) * 10000);
  }
  if (/^\d{4}$/.test(cleaned)) {
    return canonical(Number(cleaned) * 100);
  }

  const partial = /^(\d{2}|\d{4})[xX*]+$/.exec(cleaned);
  if (partial?.[1] !== undefined && cleaned.length === 6 && !partial[1].startsWith('00')) {
    const prefix = partial[1];
    const level = prefix.length / 2 + 1;
    if (isAdminLevel(level)) {
      return { kind: 'partial', prefix, level };
    }
  }

  return null;
}

function canonical(code: number): LegacyCode | null {
  return isValidCode(code) ? { kind: 'canonical', code } : null;
}

const HistoricalRowSchema = z.object({
  legacyCode: z.string({ required_error: 'missing legacy code' }).trim().min(1, 'missing legacy code'),
  nameZh: z.string({ required_error: 'missing name_zh' }).trim().min(1, 'missing name_zh'),
  namePinyin: OptionalText,
  nameEn: OptionalText,
  alpha: OptionalAlpha,
});

// CITAS writes apostrophes as backticks (Xi`an)
function fixApostrophes(value: string | undefined): string | undefined {
  return value?.replace(/`/g, "'");
}

/**
 * Shape validated CSV rows as matching candidates
 */
export function buildHistoricalRecords(
  rows: readonly CsvRow[],
  options: HistoricalParseOptions
): ParseResult<CandidateRecord> {
  const records: CandidateRecord[] = [];
  const issues: ParseIssue[] = [];
  let filtered = 0;

  rows.forEach((row, index) => {
    const todate = pickCell(row, HISTORICAL_HEADERS.todate);
    if (options.todate !== null && todate !== undefined && todate.trim() !== options.todate) {
      filtered++;
      return;
    }

    const location = rowLocation(index);
    const parsed = HistoricalRowSchema.safeParse({
      legacyCode: pickCell(row, HISTORICAL_HEADERS.legacyCode),
      nameZh: pickCell(row, HISTORICAL_HEADERS.nameZh),
      namePinyin: pickCell(row, HISTORICAL_HEADERS.namePinyin),
      nameEn: pickCell(row, HISTORICAL_HEADERS.nameEn),
      alpha: pickCell(row, HISTORICAL_HEADERS.alpha),
    });

    if (!parsed.success) {
      issues.push(toIssue('historical', zodToParseError(parsed.error, location)));
      return;
    }

    const { legacyCode, nameZh, namePinyin, nameEn, alpha } = parsed.data;
    const translated = translateLegacyCode(legacyCode);
    if (translated === null) {
      issues.push(
        toIssue('historical', new ParseError(`unrecognized legacy code "${legacyCode}"`, location))
      );
      return;
    }

    const base = {
      source: 'historical' as const,
      position: records.length,
      sourceKey: legacyCode,
      nameZh,
      namePinyin: fixApostrophes(namePinyin),
      nameEn: fixApostrophes(nameEn),
      alpha,
    };

    if (translated.kind === 'canonical') {
      const level = levelOfCode(translated.code);
      records.push({
        ...base,
        code: translated.code,
        level,
        parentPrefix: parentPrefix(translated.code, level),
      });
    } else {
      records.push({
        ...base,
        code: null,
        level: translated.level,
        parentPrefix: translated.prefix,
      });
    }
  });

  for (const issue of issues) {
    logger.warn('Skipped historical row', { location: issue.location, reason: issue.message });
  }

  logger.info('Read CITAS data', {
    rows: rows.length,
    filteredByTodate: filtered,
    usable: records.length,
    unresolvedCodes: records.filter((record) => record.code === null).length,
  });

  return { records, issues };
}

export function parseHistoricalCsv(
  content: string,
  options: HistoricalParseOptions
): ParseResult<CandidateRecord> {
  return buildHistoricalRecords(parseCsv(content), options);
}

export async function loadHistoricalRecords(
  filePath: string,
  options: HistoricalParseOptions
): Promise<ParseResult<CandidateRecord>> {
  return buildHistoricalRecords(await readCsvFile(filePath), options);
}

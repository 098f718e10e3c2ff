/**
 * GB/T 2260-2007 transcription parser
 *
 * The standard edition is transcribed in two files: the primary table and
 * a supplement with corrections and omitted codes. Rows are merged by
 * code before matching; a non-blank supplement cell replaces the primary
 * value, a blank one leaves it alone.
 *
 * @module parsers/standard-csv
 */

import { z } from 'zod';
import { parentPrefix } from '../core/codes.js';
import { ParseError } from '../core/errors.js';
import {
  isAdminLevel,
  type AdminLevel,
  type CandidateRecord,
  type ParseIssue,
  type ParseResult,
  type RegionAttributes,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import {
  OptionalAlpha,
  OptionalLevel,
  OptionalNumber,
  OptionalText,
  SixDigitCode,
  parseCsv,
  readCsvFile,
  rowLocation,
  toIssue,
  zodToParseError,
  type CsvRow,
  type CsvSource,
} from './csv.js';

const logger = createLogger({ module: 'standard-csv' });

/**
 * Columns shared by the standard files and the corrections file
 */
export const RecordRowSchema = z.object({
  code: SixDigitCode,
  name_zh: OptionalText,
  level: OptionalLevel,
  name_pinyin: OptionalText,
  name_en: OptionalText,
  alpha: OptionalAlpha,
  latitude: OptionalNumber,
  longitude: OptionalNumber,
});

/**
 * A row keyed by canonical code whose name and level may still be missing
 */
export interface PartialRecordRow extends RegionAttributes {
  readonly code: number;
  readonly nameZh?: string;
  readonly level?: AdminLevel;
}

/**
 * Validate rows against the record columns
 */
export function parseRecordRows(
  rows: readonly CsvRow[],
  source: CsvSource,
  label: string
): ParseResult<PartialRecordRow> {
  const records: PartialRecordRow[] = [];
  const issues: ParseIssue[] = [];
  const seen = new Set<number>();

  rows.forEach((row, index) => {
    const location = `${label} ${rowLocation(index)}`;
    const parsed = RecordRowSchema.safeParse(row);

    if (!parsed.success) {
      issues.push(toIssue(source, zodToParseError(parsed.error, location)));
      return;
    }

    const { data } = parsed;
    if (seen.has(data.code)) {
      issues.push(toIssue(source, new ParseError(`duplicate code ${data.code}`, location)));
      return;
    }
    seen.add(data.code);

    records.push({
      code: data.code,
      nameZh: data.name_zh,
      level: data.level !== undefined && isAdminLevel(data.level) ? data.level : undefined,
      namePinyin: data.name_pinyin,
      nameEn: data.name_en,
      alpha: data.alpha,
      latitude: data.latitude,
      longitude: data.longitude,
    });
  });

  return { records, issues };
}

/**
 * Present fields of `patch` over those of `base`
 */
export function overlayRow(base: PartialRecordRow, patch: PartialRecordRow): PartialRecordRow {
  return {
    code: base.code,
    nameZh: patch.nameZh ?? base.nameZh,
    level: patch.level ?? base.level,
    namePinyin: patch.namePinyin ?? base.namePinyin,
    nameEn: patch.nameEn ?? base.nameEn,
    alpha: patch.alpha ?? base.alpha,
    latitude: patch.latitude ?? base.latitude,
    longitude: patch.longitude ?? base.longitude,
  };
}

/**
 * Fold supplement rows into the primary rows
 *
 * Codes present in both keep their primary position; codes only in the
 * supplement are appended in supplement order.
 */
export function mergeSupplement(
  primary: readonly PartialRecordRow[],
  supplement: readonly PartialRecordRow[]
): PartialRecordRow[] {
  const merged = new Map<number, PartialRecordRow>();
  for (const row of primary) {
    merged.set(row.code, row);
  }

  for (const row of supplement) {
    const existing = merged.get(row.code);
    if (existing) {
      logger.debug('Supplement patches code', { code: row.code });
      merged.set(row.code, overlayRow(existing, row));
    } else {
      merged.set(row.code, row);
    }
  }

  return Array.from(merged.values());
}

/**
 * Require name and level, then shape rows as matching candidates
 */
export function toStandardCandidates(rows: readonly PartialRecordRow[]): ParseResult<CandidateRecord> {
  const records: CandidateRecord[] = [];
  const issues: ParseIssue[] = [];

  for (const row of rows) {
    const { code, nameZh, level, ...attributes } = row;
    if (nameZh === undefined || level === undefined) {
      const missing = nameZh === undefined ? 'name_zh' : 'level';
      issues.push(
        toIssue('standard', new ParseError(`missing ${missing} after supplement merge`, `code ${code}`))
      );
      continue;
    }

    records.push({
      ...attributes,
      source: 'standard',
      position: records.length,
      sourceKey: String(code),
      code,
      parentPrefix: parentPrefix(code, level),
      nameZh,
      level,
    });
  }

  return { records, issues };
}

/**
 * Validate, merge, and shape both standard tables
 */
export function buildStandardRecords(
  primaryRows: readonly CsvRow[],
  supplementRows: readonly CsvRow[]
): ParseResult<CandidateRecord> {
  const primary = parseRecordRows(primaryRows, 'standard', 'primary');
  const supplement = parseRecordRows(supplementRows, 'standard', 'supplement');
  const candidates = toStandardCandidates(mergeSupplement(primary.records, supplement.records));
  const issues = [...primary.issues, ...supplement.issues, ...candidates.issues];

  for (const issue of issues) {
    logger.warn('Skipped standard row', { location: issue.location, reason: issue.message });
  }

  logger.info('Loaded GB/T 2260-2007 entries', {
    primary: primary.records.length,
    supplement: supplement.records.length,
    usable: candidates.records.length,
  });

  return { records: candidates.records, issues };
}

/**
 * Parse both standard tables from their text
 */
export function parseStandardCsv(
  primaryContent: string,
  supplementContent: string | null
): ParseResult<CandidateRecord> {
  return buildStandardRecords(
    parseCsv(primaryContent),
    supplementContent === null ? [] : parseCsv(supplementContent)
  );
}

/**
 * Read and parse the standard transcription and its optional supplement
 */
export async function loadStandardRecords(
  primaryPath: string,
  supplementPath: string | null
): Promise<ParseResult<CandidateRecord>> {
  const primaryRows = await readCsvFile(primaryPath);
  const supplementRows = supplementPath === null ? [] : await readCsvFile(supplementPath);
  return buildStandardRecords(primaryRows, supplementRows);
}

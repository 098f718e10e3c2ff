/**
 * Corrections table
 *
 * Hand-maintained fixes applied after merging: `code` plus any of the
 * record columns. Non-blank cells replace the merged value.
 *
 * @module parsers/corrections-csv
 */

import type { ParseResult } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { parseCsv, readCsvFile, type CsvRow } from './csv.js';
import { parseRecordRows, type PartialRecordRow } from './standard-csv.js';

const logger = createLogger({ module: 'corrections-csv' });

export function buildCorrections(rows: readonly CsvRow[]): ParseResult<PartialRecordRow> {
  const result = parseRecordRows(rows, 'corrections', 'corrections');

  for (const issue of result.issues) {
    logger.warn('Skipped correction row', { location: issue.location, reason: issue.message });
  }
  logger.info('Loaded extra data', { corrections: result.records.length });

  return result;
}

export function parseCorrectionsCsv(content: string): ParseResult<PartialRecordRow> {
  return buildCorrections(parseCsv(content));
}

export async function loadCorrections(filePath: string): Promise<ParseResult<PartialRecordRow>> {
  return buildCorrections(await readCsvFile(filePath));
}

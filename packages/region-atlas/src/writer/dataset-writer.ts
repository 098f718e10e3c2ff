/**
 * Dataset Writer
 *
 * Writes the `latest` and `unified` tables and the audit report. Every
 * file goes through a temporary sibling and a rename.
 *
 * @module writer/dataset-writer
 */

import { join } from 'path';
import { LATEST_COLUMNS, UNIFIED_COLUMNS } from '../core/constants.js';
import { ParseError } from '../core/errors.js';
import type {
  CandidateRecord,
  MatchConflict,
  ParseIssue,
  RegionRecord,
} from '../core/types.js';
import { atomicWriteFile, atomicWriteJSON } from '../core/utils/atomic-write.js';
import { createLogger } from '../core/utils/logger.js';
import { parseCsv, readCsvFile, type CsvRow } from '../parsers/csv.js';
import { parseRecordRows } from '../parsers/standard-csv.js';
import { formatRegionCsv } from './csv-format.js';

const logger = createLogger({ module: 'dataset-writer' });

export const OUTPUT_FILES = {
  latest: 'latest.csv',
  unified: 'unified.csv',
  database: 'unified.db',
  audit: 'audit.json',
} as const;

export type OutputPaths = { readonly [K in keyof typeof OUTPUT_FILES]: string };

export function outputPaths(outputDir: string): OutputPaths {
  return {
    latest: join(outputDir, OUTPUT_FILES.latest),
    unified: join(outputDir, OUTPUT_FILES.unified),
    database: join(outputDir, OUTPUT_FILES.database),
    audit: join(outputDir, OUTPUT_FILES.audit),
  };
}

/**
 * Contents of audit.json
 */
export interface AuditReport {
  readonly release: string;
  readonly generatedAt: string;
  readonly conflicts: readonly MatchConflict[];
  readonly unmatched: readonly CandidateRecord[];
  readonly issues: readonly ParseIssue[];
}

/**
 * Write code, name and level of the scraped records
 */
export async function writeLatest(records: readonly RegionRecord[], filePath: string): Promise<void> {
  await atomicWriteFile(filePath, formatRegionCsv(records, LATEST_COLUMNS));
  logger.info('Wrote latest table', { path: filePath, records: records.length });
}

/**
 * Write the merged records with every column
 */
export async function writeUnified(records: readonly RegionRecord[], filePath: string): Promise<void> {
  await atomicWriteFile(filePath, formatRegionCsv(records, UNIFIED_COLUMNS));
  logger.info('Wrote unified table', { path: filePath, records: records.length });
}

export async function writeAuditReport(report: AuditReport, filePath: string): Promise<void> {
  await atomicWriteJSON(filePath, report);
  logger.info('Wrote audit report', {
    path: filePath,
    conflicts: report.conflicts.length,
    unmatched: report.unmatched.length,
  });
}

/**
 * Read unified rows back through the record column schema
 *
 * @throws {ParseError} on the first row that does not validate
 */
export function parseUnifiedRows(rows: readonly CsvRow[]): RegionRecord[] {
  const { records, issues } = parseRecordRows(rows, 'standard', 'unified');
  const [issue] = issues;
  if (issue) {
    throw new ParseError(issue.message, issue.location);
  }

  return records.map((row): RegionRecord => {
    const { code, nameZh, level } = row;
    if (nameZh === undefined || level === undefined) {
      throw new ParseError(`missing ${nameZh === undefined ? 'name_zh' : 'level'}`, `code ${code}`);
    }
    return { ...row, code, nameZh, level };
  });
}

export function parseUnifiedCsv(content: string): RegionRecord[] {
  return parseUnifiedRows(parseCsv(content));
}

export async function readUnifiedCsv(filePath: string): Promise<RegionRecord[]> {
  return parseUnifiedRows(await readCsvFile(filePath));
}

/**
 * Shared CSV reading and cell schemas
 *
 * Rows come back as plain string records keyed by header; the cell
 * schemas turn blank cells into `undefined` so later stages never see
 * empty strings for absent values.
 *
 * @module parsers/csv
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { ParseError, SourceUnavailableError, toError } from '../core/errors.js';
import type { ParseIssue, SourceId } from '../core/types.js';

export type CsvRow = Readonly<Record<string, string>>;

const CsvRowsSchema = z.array(z.record(z.string()));

/**
 * Parse CSV text with a header row
 *
 * A UTF-8 BOM is dropped, cells are trimmed, blank lines skipped.
 */
export function parseCsv(content: string): CsvRow[] {
  const rows: unknown = parse(content, {
    columns: true,
    bom: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  return CsvRowsSchema.parse(rows);
}

/**
 * Read a CSV source file
 *
 * @throws {SourceUnavailableError} when the file cannot be read
 */
export async function readCsvFile(filePath: string): Promise<CsvRow[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new SourceUnavailableError(`Cannot read ${filePath}`, filePath, toError(error));
  }
  return parseCsv(content);
}

/**
 * First non-blank cell among alternative header names
 */
export function pickCell(row: CsvRow, headers: readonly string[]): string | undefined {
  for (const header of headers) {
    const value = row[header];
    if (value !== undefined && value.trim() !== '') {
      return value;
    }
  }
  return undefined;
}

// ============================================================================
// Cell Schemas
// ============================================================================

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

export const OptionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

export const OptionalNumber = z.preprocess(
  blankToUndefined,
  z.coerce.number().finite().optional()
);

export const OptionalLevel = z.preprocess(
  blankToUndefined,
  z.coerce.number().int().min(1).max(3).optional()
);

export const OptionalAlpha = z.preprocess(
  blankToUndefined,
  z
    .string()
    .trim()
    .regex(/^[A-Za-z]{2,3}$/, 'alpha must be 2-3 letters')
    .optional()
);

export const SixDigitCode = z
  .string()
  .trim()
  .regex(/^\d{6}$/, 'code must be six digits')
  .transform(Number);

// ============================================================================
// Issue Helpers
// ============================================================================

/**
 * Row label as a human would count it (header is line 1)
 */
export function rowLocation(index: number): string {
  return `row ${index + 2}`;
}

/**
 * Flatten a zod failure into one ParseError
 */
export function zodToParseError(error: z.ZodError, location: string): ParseError {
  const detail = error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  return new ParseError(detail, location);
}

export function toIssue(source: ParseIssue['source'], error: ParseError): ParseIssue {
  return { source, location: error.location, message: error.message };
}

/**
 * Sources whose rows are read from CSV
 */
export type CsvSource = Exclude<SourceId, 'scraped'> | 'corrections';

/**
 * CSV formatting for region tables
 *
 * @module writer/csv-format
 */

import type { ColumnSpec } from '../core/constants.js';
import type { RegionRecord } from '../core/types.js';

/**
 * Quote a cell when it holds a delimiter, quote, or line break
 */
export function escapeCsvCell(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Text of one field; absent values are empty cells
 */
export function cellValue(record: RegionRecord, column: ColumnSpec): string {
  const value = record[column.field];
  return value === undefined ? '' : String(value);
}

/**
 * Format records as CSV sorted by code, with header row and trailing newline
 *
 * @example
 * ```typescript
 * formatRegionCsv([{ code: 110000, nameZh: '北京市', level: 1 }], LATEST_COLUMNS);
 * // 'code,name_zh,level\n110000,北京市,1\n'
 * ```
 */
export function formatRegionCsv(
  records: readonly RegionRecord[],
  columns: readonly ColumnSpec[]
): string {
  const headerRow = columns.map((column) => escapeCsvCell(column.header)).join(',');
  const dataRows = [...records]
    .sort((a, b) => a.code - b.code)
    .map((record) =>
      columns.map((column) => escapeCsvCell(cellValue(record, column))).join(',')
    );

  return [headerRow, ...dataRows].join('\n') + '\n';
}

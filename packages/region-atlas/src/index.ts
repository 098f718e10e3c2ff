/**
 * Region Atlas - GB/T 2260 administrative division dataset
 *
 * region-atlas provides:
 * - Parsers for the NBS listing pages and the standard/historical CSVs
 * - Strategy-based matching of records across code schemes
 * - Priority-table merging with an audit trail of every disagreement
 * - Atomic CSV and SQLite output
 *
 * @packageDocumentation
 */

// Service
export {
  RegionAtlasService,
  type RegionAtlasServiceOptions,
  type SourcePaths,
  type UpdateCounts,
  type UpdateOptions,
  type UpdateResult,
} from './core/region-atlas-service.js';

// Types and code helpers
export * from './core/types.js';
export {
  immediateParent,
  isValidCode,
  joinCode,
  levelOfCode,
  parentCodes,
  parentPrefix,
  splitCode,
} from './core/codes.js';
export {
  DEFAULT_LISTING_VERSION,
  LATEST_COLUMNS,
  LISTING_VERSIONS,
  UNIFIED_COLUMNS,
  isListingVersion,
  listingUrl,
  type ColumnSpec,
  type ListingVersion,
} from './core/constants.js';
export {
  ConfigError,
  EmptySourceError,
  ParseError,
  RegionAtlasError,
  SourceUnavailableError,
  WriteFailureError,
} from './core/errors.js';
export { HTTPClient, createHTTPClient, type HTTPClientConfig } from './core/http-client.js';

// Acquisition
export {
  fetchSnapshot,
  loadSnapshot,
  refreshCache,
  type Snapshot,
  type SnapshotOptions,
} from './acquisition/snapshot-source.js';

// Parsers
export { layoutForVersion, parseListingHtml, type ListingLayout } from './parsers/listing-html.js';
export { loadStandardRecords, parseStandardCsv } from './parsers/standard-csv.js';
export {
  loadHistoricalRecords,
  parseHistoricalCsv,
  translateLegacyCode,
  type LegacyCode,
} from './parsers/historical-csv.js';
export { loadCorrections, parseCorrectionsCsv } from './parsers/corrections-csv.js';

// Matching
export { matchRecords, type MatchOptions, type MatchResult } from './matching/matcher.js';
export {
  DEFAULT_STRATEGIES,
  documentOrderStrategy,
  exactCodeStrategy,
  namesAgree,
  normalizedNameStrategy,
  type MatchContext,
  type MatchPair,
  type MatchStrategy,
} from './matching/strategies.js';
export { normalizeName } from './matching/normalize.js';

// Merge
export { mergeDataset, type MergeResult, type SourceMatches } from './merge/merge-engine.js';
export {
  DEFAULT_PRIORITY,
  resolvePriority,
  type FieldPriorityTable,
} from './merge/priority.js';
export { applyCorrections } from './merge/corrections.js';
export { cleanEnglishName, cleanEnglishNames } from './merge/english-names.js';

// Writer
export {
  readUnifiedCsv,
  writeAuditReport,
  writeLatest,
  writeUnified,
  type AuditReport,
} from './writer/dataset-writer.js';
export { writeUnifiedDatabase } from './writer/sqlite-writer.js';

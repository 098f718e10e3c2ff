/**
 * RegionAtlasService - entry point for dataset updates
 *
 * Composes the modules into one run:
 *
 *   snapshot → listing parser → latest.csv
 *   standard + historical CSV → matcher → merge → corrections
 *   → English names → unified.csv, unified.db, audit.json
 *
 * Sources are loaded in a fixed order and each run depends only on its
 * inputs, so a failed run is simply repeated.
 *
 * @example
 * ```typescript
 * const atlas = new RegionAtlasService();
 * const result = await atlas.update({
 *   release: '2015-09-30',
 *   cached: true,
 *   cacheDir: './data/cache',
 *   outputDir: './data',
 *   sources: { standard: './data/gbt_2260-2007.csv', supplement: null,
 *              historical: './data/citas.csv', corrections: null },
 *   historicalTodate: '19941231',
 * });
 * ```
 */

import { access } from 'fs/promises';
import {
  loadSnapshot,
  refreshCache as refreshSnapshotCache,
  type Snapshot,
} from '../acquisition/snapshot-source.js';
import { matchRecords } from '../matching/matcher.js';
import type { VariantTable } from '../matching/normalize.js';
import type { MatchStrategy } from '../matching/strategies.js';
import { applyCorrections } from '../merge/corrections.js';
import { cleanEnglishNames } from '../merge/english-names.js';
import { mergeDataset } from '../merge/merge-engine.js';
import { DEFAULT_PRIORITY, type FieldPriorityTable } from '../merge/priority.js';
import { loadCorrections } from '../parsers/corrections-csv.js';
import { loadHistoricalRecords } from '../parsers/historical-csv.js';
import { layoutForVersion, parseListingHtml } from '../parsers/listing-html.js';
import { loadStandardRecords } from '../parsers/standard-csv.js';
import {
  outputPaths,
  writeAuditReport,
  writeLatest,
  writeUnified,
  type OutputPaths,
} from '../writer/dataset-writer.js';
import { writeUnifiedDatabase } from '../writer/sqlite-writer.js';
import type { ListingVersion } from './constants.js';
import { EmptySourceError } from './errors.js';
import { HTTPClient } from './http-client.js';
import type {
  CandidateRecord,
  MatchConflict,
  ParseIssue,
  ParseResult,
  SourceId,
} from './types.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger({ module: 'service' });

// ============================================================================
// Types
// ============================================================================

/**
 * Absolute source file paths; null disables an optional source
 */
export interface SourcePaths {
  readonly standard: string;
  readonly supplement: string | null;
  readonly historical: string;
  readonly corrections: string | null;
}

export interface UpdateOptions {
  readonly release: ListingVersion;
  readonly cached: boolean;
  readonly cacheDir: string;
  readonly outputDir: string;
  readonly sources: SourcePaths;
  /** Keep only CITAS rows with this todate; null keeps all */
  readonly historicalTodate: string | null;
  /** Append unmatched candidates with new codes to unified */
  readonly includeUnmatched?: boolean;
}

export interface UpdateCounts {
  readonly scraped: number;
  readonly standard: number;
  readonly historical: number;
  readonly unified: number;
  readonly unmatched: number;
  readonly conflicts: number;
  readonly issues: number;
  readonly corrections: number;
}

export interface UpdateResult {
  readonly release: ListingVersion;
  readonly snapshot: Pick<Snapshot, 'origin' | 'location'>;
  readonly counts: UpdateCounts;
  readonly conflicts: readonly MatchConflict[];
  readonly unmatched: readonly CandidateRecord[];
  readonly issues: readonly ParseIssue[];
  readonly paths: OutputPaths;
}

export interface RegionAtlasServiceOptions {
  readonly client?: HTTPClient;
  readonly priority?: FieldPriorityTable;
  readonly strategies?: readonly MatchStrategy[];
  readonly variants?: VariantTable;
}

// ============================================================================
// Service
// ============================================================================

export class RegionAtlasService {
  private readonly client: HTTPClient;
  private readonly priority: FieldPriorityTable;
  private readonly strategies: readonly MatchStrategy[] | undefined;
  private readonly variants: VariantTable | undefined;

  constructor(options: RegionAtlasServiceOptions = {}) {
    this.client = options.client ?? new HTTPClient();
    this.priority = options.priority ?? DEFAULT_PRIORITY;
    this.strategies = options.strategies;
    this.variants = options.variants;
  }

  /**
   * Run the full update against one listing version
   *
   * @throws {SourceUnavailableError} snapshot or required CSV missing
   * @throws {EmptySourceError} a source yields no usable records
   * @throws {WriteFailureError} an output file could not be written
   */
  async update(options: UpdateOptions): Promise<UpdateResult> {
    const paths = outputPaths(options.outputDir);
    logger.info('Starting update', { release: options.release, cached: options.cached });

    // 1. Authoritative listing
    const snapshot = await loadSnapshot({
      version: options.release,
      cached: options.cached,
      cacheDir: options.cacheDir,
      client: this.client,
    });
    const scraped = requireRecords(
      'scraped',
      parseListingHtml(snapshot.html, layoutForVersion(options.release))
    );
    logger.info('Parsed listing', { release: options.release, records: scraped.records.length });

    await writeLatest(scraped.records, paths.latest);

    // 2. Secondary sources, always standard before historical
    const supplementPath = await optionalSource(options.sources.supplement, 'supplement');
    const standard = requireRecords(
      'standard',
      await loadStandardRecords(options.sources.standard, supplementPath)
    );
    const historical = requireRecords(
      'historical',
      await loadHistoricalRecords(options.sources.historical, { todate: options.historicalTodate })
    );

    // 3. Align with the listing
    const matchOptions = { strategies: this.strategies, variants: this.variants };
    const standardMatch = matchRecords(scraped.records, standard.records, matchOptions);
    const historicalMatch = matchRecords(scraped.records, historical.records, matchOptions);
    const unmatched = [...standardMatch.unmatched, ...historicalMatch.unmatched];

    // 4. Merge, correct, clean
    const merged = mergeDataset(
      scraped.records,
      { standard: standardMatch.matches, historical: historicalMatch.matches },
      this.priority,
      { unmatched, includeUnmatched: options.includeUnmatched ?? false }
    );

    const correctionsPath = await optionalSource(options.sources.corrections, 'corrections');
    const corrections = correctionsPath === null ? null : await loadCorrections(correctionsPath);
    const corrected = applyCorrections(merged.records, corrections?.records ?? []);
    const unified = cleanEnglishNames(corrected.records);

    // 5. Outputs
    const conflicts: MatchConflict[] = [
      ...standardMatch.conflicts,
      ...historicalMatch.conflicts,
      ...merged.conflicts,
    ];
    const issues: ParseIssue[] = [
      ...scraped.issues,
      ...standard.issues,
      ...historical.issues,
      ...(corrections?.issues ?? []),
    ];

    await writeUnified(unified, paths.unified);
    await writeUnifiedDatabase(unified, paths.database);
    await writeAuditReport(
      {
        release: options.release,
        generatedAt: new Date().toISOString(),
        conflicts,
        unmatched,
        issues,
      },
      paths.audit
    );

    const counts: UpdateCounts = {
      scraped: scraped.records.length,
      standard: standard.records.length,
      historical: historical.records.length,
      unified: unified.length,
      unmatched: unmatched.length,
      conflicts: conflicts.length,
      issues: issues.length,
      corrections: corrected.applied,
    };
    logger.info('Update complete', { release: options.release, ...counts });

    return {
      release: options.release,
      snapshot: { origin: snapshot.origin, location: snapshot.location },
      counts,
      conflicts,
      unmatched,
      issues,
      paths,
    };
  }

  /**
   * Download listing versions into the cache
   *
   * @returns Paths written
   */
  async refreshCache(versions: readonly ListingVersion[], cacheDir: string): Promise<string[]> {
    return refreshSnapshotCache({ versions, cacheDir, client: this.client });
  }
}

// ============================================================================
// Helpers
// ============================================================================

function requireRecords<T>(source: SourceId, result: ParseResult<T>): ParseResult<T> {
  if (result.records.length === 0) {
    throw new EmptySourceError(source, result.issues);
  }
  return result;
}

/**
 * Path of an optional source, or null when it is disabled or absent
 */
async function optionalSource(filePath: string | null, label: string): Promise<string | null> {
  if (filePath === null) return null;
  try {
    await access(filePath);
    return filePath;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.warn('Optional source not found, skipping', { source: label, path: filePath });
      return null;
    }
    throw error;
  }
}

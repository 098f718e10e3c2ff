/**
 * Update Command
 *
 * Rebuild latest.csv, unified.csv, unified.db and audit.json from one
 * listing release and the CSV sources.
 *
 * Usage:
 *   region-atlas update [options]
 *
 * Options:
 *   --release <date>      Listing release (default: 2015-09-30)
 *   --cached              Read the cached listing instead of fetching
 *   --include-unmatched   Append unmatched records with new codes to unified
 *   --output <dir>        Output directory
 *   --config <file>       Config file (default: .region-atlasrc search)
 *   -v, --verbose         Debug logging
 *   --json                Print the run summary as JSON
 *
 * Examples:
 *   region-atlas update --cached
 *   region-atlas update --release 2013-08-31 --output ./out --json
 */

import type { Command } from 'commander';
import { RegionAtlasService, type UpdateResult } from '../../core/region-atlas-service.js';
import { HTTPClient } from '../../core/http-client.js';
import { EmptySourceError, toError } from '../../core/errors.js';
import { setLogLevel } from '../../core/utils/logger.js';
import { loadConfig, resolvePath, resolveSourcePaths } from '../lib/config.js';
import { EXIT_CODES, exitCodeFor, type ExitCode } from '../lib/exit-codes.js';

/**
 * Update options from CLI
 */
export interface UpdateCommandOptions {
  readonly release?: string;
  readonly cached?: boolean;
  readonly includeUnmatched?: boolean;
  readonly output?: string;
  readonly config?: string;
  readonly verbose?: boolean;
  readonly json?: boolean;
}

/**
 * Register the update command
 */
export function registerUpdateCommand(program: Command): void {
  program
    .command('update')
    .description('Rebuild the unified dataset from a listing release')
    .option('--release <date>', 'Listing release (publication date)')
    .option('--cached', 'Read the cached listing instead of the NBS website')
    .option('--include-unmatched', 'Append unmatched records with new codes to unified')
    .option('-o, --output <dir>', 'Output directory')
    .option('--config <file>', 'Path to config file (default: .region-atlasrc)')
    .option('-v, --verbose', 'Verbose output')
    .option('--json', 'Output summary as JSON')
    .action(async (options: UpdateCommandOptions) => {
      process.exitCode = await executeUpdate(options);
    });
}

/**
 * Run the update and report it
 *
 * @returns Exit code: 0 clean, 1 conflicts or unmatched records, else
 *   the code for the error that stopped the run
 */
export async function executeUpdate(options: UpdateCommandOptions): Promise<ExitCode> {
  try {
    const config = await loadConfig({
      configPath: options.config,
      overrides: {
        release: options.release,
        output: options.output,
        cached: options.cached,
        includeUnmatched: options.includeUnmatched,
        verbose: options.verbose,
        json: options.json,
      },
    });
    setLogLevel(config.verbose ? 'debug' : config.json ? 'warn' : 'info');

    const atlas = new RegionAtlasService({
      client: new HTTPClient({
        timeoutMs: config.http.timeoutMs,
        maxRetries: config.http.maxRetries,
      }),
      priority: config.priority,
    });

    const result = await atlas.update({
      release: config.release,
      cached: config.cached,
      cacheDir: resolvePath(config, 'cache'),
      outputDir: resolvePath(config, 'output'),
      sources: resolveSourcePaths(config),
      historicalTodate: config.historical.todate,
      includeUnmatched: config.includeUnmatched,
    });

    const exitCode =
      result.conflicts.length > 0 || result.unmatched.length > 0
        ? EXIT_CODES.WARNINGS
        : EXIT_CODES.SUCCESS;

    if (options.json) {
      console.log(JSON.stringify({ success: true, exitCode, ...summarize(result) }, null, 2));
    } else {
      printSummary(result);
    }
    return exitCode;
  } catch (error) {
    const exitCode = exitCodeFor(error);
    const message =
      error instanceof EmptySourceError ? error.getSummary() : toError(error).message;

    if (options.json) {
      console.log(JSON.stringify({ success: false, exitCode, error: message }, null, 2));
    } else {
      console.error(`\nError: ${message}`);
    }
    return exitCode;
  }
}

function summarize(result: UpdateResult): Record<string, unknown> {
  return {
    release: result.release,
    snapshot: result.snapshot,
    counts: result.counts,
    paths: result.paths,
  };
}

function printSummary(result: UpdateResult): void {
  const { counts } = result;

  console.log('\nRegion Atlas Update');
  console.log('='.repeat(50));
  console.log(`Release:    ${result.release} (${result.snapshot.origin})`);
  console.log(`Scraped:    ${counts.scraped}`);
  console.log(`Standard:   ${counts.standard}`);
  console.log(`Historical: ${counts.historical}`);
  console.log(`Unified:    ${counts.unified}`);
  console.log(`Unmatched:  ${counts.unmatched}`);
  console.log(`Conflicts:  ${counts.conflicts}`);
  console.log(`Skipped:    ${counts.issues}`);
  console.log('');
  console.log(`Output: ${result.paths.unified}`);

  if (counts.conflicts > 0 || counts.unmatched > 0) {
    console.log(`Review ${result.paths.audit} for conflicts and unmatched records`);
  }
}

/**
 * Refresh Cache Command
 *
 * Download listing snapshots into the cache directory so later updates
 * can run with --cached.
 *
 * Usage:
 *   region-atlas refresh-cache [options]
 *
 * Options:
 *   --release <date>   Only this release (default: every known release)
 *   --config <file>    Config file
 *   -v, --verbose      Debug logging
 */

import type { Command } from 'commander';
import { LISTING_VERSIONS, type ListingVersion } from '../../core/constants.js';
import { toError } from '../../core/errors.js';
import { HTTPClient } from '../../core/http-client.js';
import { RegionAtlasService } from '../../core/region-atlas-service.js';
import { setLogLevel } from '../../core/utils/logger.js';
import { loadConfig, resolvePath } from '../lib/config.js';
import { EXIT_CODES, exitCodeFor, type ExitCode } from '../lib/exit-codes.js';

export interface RefreshCacheCommandOptions {
  readonly release?: string;
  readonly config?: string;
  readonly verbose?: boolean;
}

/**
 * Register the refresh-cache command
 */
export function registerRefreshCacheCommand(program: Command): void {
  program
    .command('refresh-cache')
    .description('Download listing snapshots into the cache')
    .option('--release <date>', 'Only this release (default: all known releases)')
    .option('--config <file>', 'Path to config file (default: .region-atlasrc)')
    .option('-v, --verbose', 'Verbose output')
    .action(async (options: RefreshCacheCommandOptions) => {
      process.exitCode = await executeRefreshCache(options);
    });
}

export async function executeRefreshCache(options: RefreshCacheCommandOptions): Promise<ExitCode> {
  try {
    // --release is validated by loadConfig; without it every release is fetched
    const config = await loadConfig({
      configPath: options.config,
      overrides: { release: options.release, verbose: options.verbose },
    });
    setLogLevel(config.verbose ? 'debug' : 'info');

    const versions: readonly ListingVersion[] =
      options.release !== undefined ? [config.release] : LISTING_VERSIONS;

    const atlas = new RegionAtlasService({
      client: new HTTPClient({
        timeoutMs: config.http.timeoutMs,
        maxRetries: config.http.maxRetries,
      }),
    });
    const written = await atlas.refreshCache(versions, resolvePath(config, 'cache'));

    console.log(`\nCached ${written.length} listing(s):`);
    for (const path of written) {
      console.log(`  ${path}`);
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    console.error(`\nError: ${toError(error).message}`);
    return exitCodeFor(error);
  }
}

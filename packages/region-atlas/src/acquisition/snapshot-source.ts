/**
 * Listing snapshot acquisition
 *
 * A snapshot is the HTML of one published listing version. Live mode
 * downloads it and keeps the raw bytes in the cache directory; cached mode
 * only reads that copy. Both decode through the page's own charset.
 *
 * @module acquisition/snapshot-source
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { listingUrl, type ListingVersion } from '../core/constants.js';
import { SourceUnavailableError, toError } from '../core/errors.js';
import { HTTPClient, decodeBody } from '../core/http-client.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';
import { createLogger } from '../core/utils/logger.js';

const logger = createLogger({ module: 'snapshot' });

export interface SnapshotOptions {
  readonly version: ListingVersion;
  /** Read the cached copy instead of fetching */
  readonly cached: boolean;
  readonly cacheDir: string;
  readonly client?: HTTPClient;
}

export interface Snapshot {
  readonly version: ListingVersion;
  readonly html: string;
  /** Bytes as served, kept for the cache */
  readonly raw: Uint8Array;
  readonly origin: 'cache' | 'live';
  /** Cache file path or URL */
  readonly location: string;
}

export function cachePathFor(cacheDir: string, version: ListingVersion): string {
  return join(cacheDir, `${version}.html`);
}

async function readCachedSnapshot(cacheDir: string, version: ListingVersion): Promise<Snapshot> {
  const location = cachePathFor(cacheDir, version);
  let raw: Uint8Array;
  try {
    raw = await readFile(location);
  } catch (error) {
    throw new SourceUnavailableError(
      `No cached listing for ${version} at ${location}; run refresh-cache first`,
      location,
      toError(error)
    );
  }
  logger.info('Read cached listing', { version, path: location });
  return { version, html: decodeBody(raw, ''), raw, origin: 'cache', location };
}

/**
 * Download one listing version
 *
 * @throws {SourceUnavailableError} when every attempt fails
 */
export async function fetchSnapshot(
  version: ListingVersion,
  client: HTTPClient = new HTTPClient()
): Promise<Snapshot> {
  const url = listingUrl(version);
  logger.info('Fetching listing', { version, url });

  try {
    const { bytes, contentType } = await client.fetchBytes(url);
    return { version, html: decodeBody(bytes, contentType), raw: bytes, origin: 'live', location: url };
  } catch (error) {
    const cause = toError(error);
    throw new SourceUnavailableError(`Failed to fetch ${url}: ${cause.message}`, url, cause);
  }
}

/**
 * Snapshot from the cache or the network
 *
 * A live download also refreshes the cached copy.
 */
export async function loadSnapshot(options: SnapshotOptions): Promise<Snapshot> {
  if (options.cached) {
    return readCachedSnapshot(options.cacheDir, options.version);
  }

  const snapshot = await fetchSnapshot(options.version, options.client);
  await atomicWriteFile(cachePathFor(options.cacheDir, options.version), snapshot.raw);
  return snapshot;
}

export interface RefreshCacheOptions {
  readonly versions: readonly ListingVersion[];
  readonly cacheDir: string;
  readonly client?: HTTPClient;
}

/**
 * Fetch each version and store it in the cache
 *
 * Versions are fetched one after another; the first failure stops the
 * refresh.
 *
 * @returns Paths written, in version order
 */
export async function refreshCache(options: RefreshCacheOptions): Promise<string[]> {
  const client = options.client ?? new HTTPClient();
  const written: string[] = [];

  for (const version of options.versions) {
    const snapshot = await fetchSnapshot(version, client);
    const path = cachePathFor(options.cacheDir, version);
    await atomicWriteFile(path, snapshot.raw);
    logger.info('Cached listing', { version, path, bytes: snapshot.raw.byteLength });
    written.push(path);
  }

  return written;
}

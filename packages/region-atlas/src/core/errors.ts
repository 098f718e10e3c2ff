/**
 * Region Atlas Error Types
 *
 * Fatal failures are thrown as the classes below. Per-record parse
 * problems are collected as ParseIssues and match conflicts are data
 * (see core/types), so neither aborts a run.
 */

import type { ParseIssue, SourceId } from './types.js';

/**
 * Base class carrying a stable machine-readable code
 */
export class RegionAtlasError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = 'RegionAtlasError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Snapshot could not be fetched, or the cached copy is missing
 */
export class SourceUnavailableError extends RegionAtlasError {
  constructor(
    message: string,
    public readonly location: string,
    public readonly cause?: Error
  ) {
    super(message, 'SOURCE_UNAVAILABLE');
    this.name = 'SourceUnavailableError';
  }
}

/**
 * A row or node lacks a required field
 *
 * Thrown inside a parser and converted to a ParseIssue by the caller,
 * which skips the record.
 */
export class ParseError extends RegionAtlasError {
  constructor(
    message: string,
    public readonly location: string
  ) {
    super(message, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

/**
 * Every record of a source was rejected
 */
export class EmptySourceError extends RegionAtlasError {
  constructor(
    public readonly source: SourceId,
    public readonly issues: readonly ParseIssue[]
  ) {
    super(`No usable records in ${source} source (${issues.length} rejected)`, 'EMPTY_SOURCE');
    this.name = 'EmptySourceError';
  }

  /**
   * First few rejection reasons, one per line
   */
  getSummary(limit = 5): string {
    const lines = this.issues
      .slice(0, limit)
      .map((issue) => `  - ${issue.location}: ${issue.message}`);
    if (this.issues.length > limit) {
      lines.push(`  ... and ${this.issues.length - limit} more`);
    }
    return [this.message, ...lines].join('\n');
  }
}

/**
 * An output file could not be written; the previous file is untouched
 */
export class WriteFailureError extends RegionAtlasError {
  constructor(
    public readonly filePath: string,
    public readonly cause: Error
  ) {
    super(`Failed to write ${filePath}: ${cause.message}`, 'WRITE_FAILURE');
    this.name = 'WriteFailureError';
  }
}

/**
 * Configuration file or flags are invalid
 */
export class ConfigError extends RegionAtlasError {
  constructor(
    message: string,
    public readonly configPath: string | null
  ) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

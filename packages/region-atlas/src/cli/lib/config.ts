/**
 * Region Atlas CLI Configuration Management
 *
 * Loads configuration from .region-atlasrc (YAML or JSON) with
 * environment variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (REGION_ATLAS_*)
 * 3. Config file (.region-atlasrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  DEFAULT_HISTORICAL_TODATE,
  DEFAULT_LISTING_VERSION,
  LISTING_VERSIONS,
  isListingVersion,
  type ListingVersion,
} from '../../core/constants.js';
import { ConfigError, toError } from '../../core/errors.js';
import type { SourcePaths } from '../../core/region-atlas-service.js';
import {
  PriorityOverrideSchema,
  resolvePriority,
  type FieldPriorityTable,
} from '../../merge/priority.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface PathsConfig {
  /** Directory holding the source CSV files */
  readonly data: string;
  /** Directory for cached listing snapshots */
  readonly cache: string;
  /** Directory receiving latest.csv, unified.csv, unified.db, audit.json */
  readonly output: string;
}

/**
 * Source file names inside the data directory; null disables an
 * optional source
 */
export interface SourcesConfig {
  readonly standard: string;
  readonly supplement: string | null;
  readonly historical: string;
  readonly corrections: string | null;
}

export interface HttpConfig {
  readonly timeoutMs: number;
  readonly maxRetries: number;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  readonly release: ListingVersion;
  readonly paths: PathsConfig;
  readonly sources: SourcesConfig;
  readonly historical: {
    /** Keep only CITAS rows with this todate; null keeps all */
    readonly todate: string | null;
  };
  readonly http: HttpConfig;
  readonly priority: FieldPriorityTable;

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  readonly cached: boolean;
  readonly includeUnmatched: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

const ReleaseSchema = z.custom<ListingVersion>(
  (value) => typeof value === 'string' && isListingVersion(value),
  { message: `release must be one of ${LISTING_VERSIONS.join(', ')}` }
);

const NonEmpty = z.string().trim().min(1);

/**
 * Config file structure (YAML or JSON)
 */
export const ConfigFileSchema = z
  .object({
    release: ReleaseSchema,
    paths: z.object({ data: NonEmpty, cache: NonEmpty, output: NonEmpty }).partial().strict(),
    sources: z
      .object({
        standard: NonEmpty,
        supplement: NonEmpty.nullable(),
        historical: NonEmpty,
        corrections: NonEmpty.nullable(),
      })
      .partial()
      .strict(),
    historical: z
      .object({
        // YAML reads an unquoted 19941231 as a number
        todate: z
          .union([z.string(), z.number().int()])
          .transform(String)
          .pipe(z.string().regex(/^\d{8}$/, 'todate must be YYYYMMDD'))
          .nullable(),
      })
      .partial()
      .strict(),
    http: z
      .object({
        timeoutMs: z.number().int().positive(),
        maxRetries: z.number().int().min(0).max(10),
      })
      .partial()
      .strict(),
    priority: PriorityOverrideSchema,
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Pick<CLIConfig, 'release' | 'paths' | 'sources' | 'historical' | 'http'> = {
  release: DEFAULT_LISTING_VERSION,

  paths: {
    data: './data',
    cache: './data/cache',
    output: './data',
  },

  sources: {
    standard: 'gbt_2260-2007.csv',
    supplement: 'gbt_2260-2007_sup.csv',
    historical: 'citas.csv',
    corrections: 'extra.csv',
  },

  historical: {
    todate: DEFAULT_HISTORICAL_TODATE,
  },

  http: {
    timeoutMs: 30000,
    maxRetries: 3,
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.region-atlasrc',
  '.region-atlasrc.yaml',
  '.region-atlasrc.yml',
  '.region-atlasrc.json',
];

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and validate a config file
 *
 * @throws {ConfigError} when the file is unreadable or invalid
 */
export function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    // YAML is a superset of JSON, so one parser covers every file name
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Cannot read config file: ${toError(error).message}`, filePath);
  }

  // An empty file parses to null
  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file: ${detail}`, filePath);
  }
  return parsed.data;
}

/**
 * Get environment variable with prefix
 */
function getEnvVar(name: string): string | undefined {
  const value = process.env[`REGION_ATLAS_${name}`];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Get numeric environment variable
 */
function getEnvNumber(name: string): number | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** CLI flag overrides */
  overrides?: {
    release?: string;
    output?: string;
    verbose?: boolean;
    json?: boolean;
    cached?: boolean;
    includeUnmatched?: boolean;
  };
  /** Directory to start the config file search from (default: cwd) */
  cwd?: string;
}

function locateConfigFile(options: LoadConfigOptions): string | null {
  if (options.configPath) {
    const configPath = resolve(options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
    return configPath;
  }

  const envConfigPath = getEnvVar('CONFIG');
  if (envConfigPath) {
    const configPath = resolve(envConfigPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
    return configPath;
  }

  return findConfigFile(options.cwd ?? process.cwd());
}

/**
 * Load and merge configuration from all sources
 *
 * @throws {ConfigError} for a missing or invalid config file, an unknown
 *   release, or a priority table that demotes the scraped listing
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const configPath = locateConfigFile(options);
  const fileConfig: ConfigFile = configPath ? parseConfigFile(configPath) : {};
  const overrides = options.overrides ?? {};

  const release = overrides.release ?? fileConfig.release ?? DEFAULT_CONFIG.release;
  if (!isListingVersion(release)) {
    throw new ConfigError(
      `Unknown release ${release}; expected one of ${LISTING_VERSIONS.join(', ')}`,
      configPath
    );
  }

  const historicalTodate =
    fileConfig.historical?.todate !== undefined
      ? fileConfig.historical.todate
      : DEFAULT_CONFIG.historical.todate;

  return {
    release,

    paths: {
      data: getEnvVar('DATA_DIR') ?? fileConfig.paths?.data ?? DEFAULT_CONFIG.paths.data,
      cache: getEnvVar('CACHE_DIR') ?? fileConfig.paths?.cache ?? DEFAULT_CONFIG.paths.cache,
      // --output is relative to the working directory, not the config file
      output:
        (overrides.output !== undefined ? resolve(overrides.output) : undefined) ??
        getEnvVar('OUTPUT_DIR') ??
        fileConfig.paths?.output ??
        DEFAULT_CONFIG.paths.output,
    },

    sources: {
      standard: fileConfig.sources?.standard ?? DEFAULT_CONFIG.sources.standard,
      supplement:
        fileConfig.sources?.supplement !== undefined
          ? fileConfig.sources.supplement
          : DEFAULT_CONFIG.sources.supplement,
      historical: fileConfig.sources?.historical ?? DEFAULT_CONFIG.sources.historical,
      corrections:
        fileConfig.sources?.corrections !== undefined
          ? fileConfig.sources.corrections
          : DEFAULT_CONFIG.sources.corrections,
    },

    historical: {
      todate: historicalTodate,
    },

    http: {
      timeoutMs:
        getEnvNumber('TIMEOUT') ?? fileConfig.http?.timeoutMs ?? DEFAULT_CONFIG.http.timeoutMs,
      maxRetries:
        getEnvNumber('RETRIES') ?? fileConfig.http?.maxRetries ?? DEFAULT_CONFIG.http.maxRetries,
    },

    priority: resolvePriority(fileConfig.priority, configPath),

    // Runtime flags
    verbose: overrides.verbose ?? false,
    json: overrides.json ?? false,
    cached: overrides.cached ?? false,
    includeUnmatched: overrides.includeUnmatched ?? false,
    configPath,
  };
}

/**
 * Resolve a configured directory against the config file's directory,
 * or the working directory when there is no config file
 */
export function resolvePath(config: CLIConfig, pathKey: keyof PathsConfig): string {
  const basePath = config.configPath ? resolve(config.configPath, '..') : process.cwd();
  return resolve(basePath, config.paths[pathKey]);
}

/**
 * Absolute source file paths; disabled optional sources stay null
 */
export function resolveSourcePaths(config: CLIConfig): SourcePaths {
  const dataDir = resolvePath(config, 'data');
  const inData = (fileName: string | null): string | null =>
    fileName === null ? null : join(dataDir, fileName);

  return {
    standard: join(dataDir, config.sources.standard),
    supplement: inData(config.sources.supplement),
    historical: join(dataDir, config.sources.historical),
    corrections: inData(config.sources.corrections),
  };
}

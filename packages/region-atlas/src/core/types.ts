/**
 * Core Types for Region Atlas
 *
 * One explicit record shape for every source. Optional fields are absent
 * (`undefined`) rather than empty strings, so presence is always tested
 * with `!== undefined`.
 *
 * @module core/types
 */

// ============================================================================
// Region Records
// ============================================================================

/**
 * Administrative tier: 1 province, 2 prefecture, 3 county
 */
export type AdminLevel = 1 | 2 | 3;

/**
 * A single administrative division
 */
export interface RegionRecord {
  /** Six-digit GB/T 2260 code */
  readonly code: number;
  readonly nameZh: string;
  readonly level: AdminLevel;
  readonly namePinyin?: string;
  readonly nameEn?: string;
  /** Two or three letter region code */
  readonly alpha?: string;
  readonly latitude?: number;
  readonly longitude?: number;
}

export type RegionField = keyof RegionRecord;

/**
 * Fields that may be absent from a record
 */
export type OptionalRegionField = Exclude<RegionField, 'code' | 'nameZh' | 'level'>;

/**
 * Optional fields carried alongside a record's identity
 */
export type RegionAttributes = Pick<RegionRecord, OptionalRegionField>;

// ============================================================================
// Sources
// ============================================================================

/**
 * Where a record came from
 *
 * - scraped: the published NBS listing (authoritative)
 * - standard: GB/T 2260-2007 transcription plus supplement
 * - historical: CITAS 1982-1992 dataset
 */
export type SourceId = 'scraped' | 'standard' | 'historical';

export type CandidateSource = Exclude<SourceId, 'scraped'>;

/**
 * A non-scraped record awaiting alignment with the scraped set
 */
export interface CandidateRecord extends RegionAttributes {
  readonly source: CandidateSource;
  /** Zero-based row position in the source file */
  readonly position: number;
  /** Identifier as written in the source (legacy code, CSV code) */
  readonly sourceKey: string;
  /** Canonical code, or null when only the parent prefix is known */
  readonly code: number | null;
  /** Parent code prefix: 4 digits for level 3, 2 for level 2, '' for level 1 */
  readonly parentPrefix: string;
  readonly nameZh: string;
  readonly level: AdminLevel;
}

/**
 * Location of a problem inside a source
 */
export interface ParseIssue {
  readonly source: SourceId | 'corrections';
  /** Row number, node index, or similar */
  readonly location: string;
  readonly message: string;
}

/**
 * Outcome of parsing one source
 */
export interface ParseResult<T> {
  readonly records: readonly T[];
  readonly issues: readonly ParseIssue[];
}

// ============================================================================
// Conflicts
// ============================================================================

export interface AmbiguousMatchConflict {
  readonly kind: 'ambiguous-match';
  readonly source: CandidateSource;
  readonly sourceKey: string;
  readonly nameZh: string;
  /** Scraped codes that matched equally well */
  readonly candidates: readonly number[];
}

export interface FieldDisagreementConflict {
  readonly kind: 'field-disagreement';
  readonly code: number;
  readonly field: RegionField;
  readonly chosen: { readonly source: SourceId; readonly value: string | number };
  readonly rejected: { readonly source: SourceId; readonly value: string | number };
}

/**
 * Ambiguity or disagreement recorded for audit, never thrown
 */
export type MatchConflict = AmbiguousMatchConflict | FieldDisagreementConflict;

/**
 * Type guard for level values read from untyped input
 */
export function isAdminLevel(value: number): value is AdminLevel {
  return value === 1 || value === 2 || value === 3;
}

/**
 * Region Atlas Constants
 *
 * Published listing versions, output column order, and name suffixes.
 *
 * @module core/constants
 */

import type { RegionField } from './types.js';

// ============================================================================
// Snapshot Versions
// ============================================================================

/**
 * Base URL of the NBS administrative division code listings
 */
export const LISTING_BASE_URL = 'http://www.stats.gov.cn/tjsj/tjbz/xzqhdm/';

/**
 * Known listing versions (data date) and their page paths
 */
export const LISTING_PATHS = {
  '2015-09-30': '201608/t20160809_1386477.html',
  '2014-10-31': '201504/t20150415_712722.html',
  '2013-08-31': '201401/t20140116_501070.html',
  '2012-10-31': '201301/t20130118_38316.html',
} as const;

export type ListingVersion = keyof typeof LISTING_PATHS;

export const LISTING_VERSIONS: readonly ListingVersion[] = [
  '2015-09-30',
  '2014-10-31',
  '2013-08-31',
  '2012-10-31',
];

export const DEFAULT_LISTING_VERSION: ListingVersion = '2015-09-30';

export function isListingVersion(value: string): value is ListingVersion {
  return LISTING_VERSIONS.some((version) => version === value);
}

export function listingUrl(version: ListingVersion): string {
  return LISTING_BASE_URL + LISTING_PATHS[version];
}

// ============================================================================
// Output Columns
// ============================================================================

/**
 * Column name and record field, in output order
 */
export interface ColumnSpec {
  readonly header: string;
  readonly field: RegionField;
}

export const LATEST_COLUMNS: readonly ColumnSpec[] = [
  { header: 'code', field: 'code' },
  { header: 'name_zh', field: 'nameZh' },
  { header: 'level', field: 'level' },
];

export const UNIFIED_COLUMNS: readonly ColumnSpec[] = [
  ...LATEST_COLUMNS,
  { header: 'name_pinyin', field: 'namePinyin' },
  { header: 'name_en', field: 'nameEn' },
  { header: 'alpha', field: 'alpha' },
  { header: 'latitude', field: 'latitude' },
  { header: 'longitude', field: 'longitude' },
];

// ============================================================================
// Names
// ============================================================================

/**
 * Administrative suffixes stripped before name comparison, longest first
 */
export const NAME_SUFFIXES_ZH = [
  '自治县',
  '自治州',
  '自治旗',
  '市辖区',
  '林区',
  '特区',
  '矿区',
  '地区',
  '新区',
  '市',
  '区',
  '县',
  '旗',
  '盟',
  '省',
] as const;

/**
 * Romanized type words trailing English names in the CITAS data
 */
export const NAME_SUFFIXES_EN = [
  'kuangqu',
  'qi',
  'qu',
  'shi',
  'xian',
  'zizhixian',
  'zizhizhou',
] as const;

/**
 * Name used for the "city districts" placeholder division
 */
export const CITY_DISTRICTS_ZH = '市辖区';

/**
 * CITAS rows valid at the end of the dataset period
 */
export const DEFAULT_HISTORICAL_TODATE = '19941231';

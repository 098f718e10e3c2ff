/**
 * English name cleanup
 *
 * Romanized names arrive as e.g. 'Beijing: Dongcheng qu'. The prefix
 * repeats the parent's name and the trailing word is the division type,
 * so both are dropped. City-district placeholders (市辖区) without an
 * English name borrow their parent's: 'Shijiazhuang city area'.
 *
 * @module merge/english-names
 */

import { parentCodes } from '../core/codes.js';
import { CITY_DISTRICTS_ZH, NAME_SUFFIXES_EN } from '../core/constants.js';
import type { RegionRecord } from '../core/types.js';

const CITY_AREA = ' city area';

const NAME_PATTERN = new RegExp(`^(?:[^:]*: )?(.*?)(?: (?:${NAME_SUFFIXES_EN.join('|')}))?$`);

/**
 * Strip the parent prefix and the type word from one English name
 *
 * Applied until nothing changes, so cleaning a clean name is a no-op.
 *
 * @example
 * ```typescript
 * cleanEnglishName('Beijing: Haidian qu'); // 'Haidian'
 * cleanEnglishName('Shijiazhuang shixiaqu'); // 'Shijiazhuang city area'
 * ```
 */
export function cleanEnglishName(name: string): string {
  let current = name.replace(/ shixiaqu/g, CITY_AREA).trim();

  for (;;) {
    const stripped = NAME_PATTERN.exec(current)?.[1] ?? current;
    // keep the name when stripping would leave nothing
    const next = stripped === '' ? current : stripped;
    if (next === current) return current;
    current = next;
  }
}

/**
 * Clean every English name and fill city-district placeholders
 *
 * Returns new records in the same order.
 */
export function cleanEnglishNames(records: readonly RegionRecord[]): RegionRecord[] {
  const cleaned = records.map((record) =>
    record.nameEn === undefined ? record : { ...record, nameEn: cleanEnglishName(record.nameEn) }
  );
  const byCode = new Map(cleaned.map((record) => [record.code, record]));

  return cleaned.map((record) => {
    if (record.nameEn !== undefined || record.nameZh !== CITY_DISTRICTS_ZH) {
      return record;
    }

    const parentCode = parentCodes(record.code)[1];
    const parentName = parentCode === record.code ? undefined : byCode.get(parentCode)?.nameEn;
    return parentName === undefined ? record : { ...record, nameEn: parentName + CITY_AREA };
  });
}

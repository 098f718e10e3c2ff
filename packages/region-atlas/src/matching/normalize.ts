/**
 * Name normalization for cross-source comparison
 *
 * Two spellings of the same division compare equal once whitespace is
 * gone, traditional characters are folded to simplified ones, and one
 * administrative suffix (市, 区, 自治县, ...) is stripped.
 *
 * @module matching/normalize
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { NAME_SUFFIXES_ZH } from '../core/constants.js';

const VariantTableSchema = z.record(z.string().length(1), z.string().length(1));

export type VariantTable = ReadonlyMap<string, string>;

const VARIANTS_PATH = fileURLToPath(
  new URL('../../data/character-variants.json', import.meta.url)
);

let defaultVariants: VariantTable | null = null;

/**
 * Traditional → simplified character table shipped with the package
 */
export function getDefaultVariants(): VariantTable {
  if (!defaultVariants) {
    const parsed = VariantTableSchema.parse(JSON.parse(readFileSync(VARIANTS_PATH, 'utf-8')));
    defaultVariants = new Map(Object.entries(parsed));
  }
  return defaultVariants;
}

/**
 * Replace every traditional character that has a simplified form
 */
export function toSimplified(text: string, variants: VariantTable = getDefaultVariants()): string {
  let result = '';
  for (const char of text) {
    result += variants.get(char) ?? char;
  }
  return result;
}

/**
 * Strip the longest matching administrative suffix, keeping at least
 * one character of the name
 */
export function stripAdminSuffix(name: string): string {
  for (const suffix of NAME_SUFFIXES_ZH) {
    if (name.length > suffix.length && name.endsWith(suffix)) {
      return name.slice(0, -suffix.length);
    }
  }
  return name;
}

/**
 * Comparable form of a Chinese division name
 *
 * @example
 * ```typescript
 * normalizeName(' 海澱 區 '); // '海淀'
 * ```
 */
export function normalizeName(name: string, variants?: VariantTable): string {
  const compact = name.normalize('NFKC').replace(/\s+/gu, '');
  return stripAdminSuffix(toSimplified(compact, variants));
}

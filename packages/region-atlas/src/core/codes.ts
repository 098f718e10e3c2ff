/**
 * GB/T 2260 code structure helpers
 *
 * A code is three two-digit groups: province, prefecture, county.
 * Trailing zero groups mark a higher-level division (330000 is a
 * province, 331000 a prefecture, 331024 a county).
 *
 * @module core/codes
 */

import { isAdminLevel, type AdminLevel } from './types.js';

/**
 * Split a code into its province, prefecture and county groups
 *
 * @example
 * ```typescript
 * splitCode(331024); // [33, 10, 24]
 * ```
 */
export function splitCode(code: number): [number, number, number] {
  return [Math.floor(code / 10000), Math.floor((code % 10000) / 100), code % 100];
}

/**
 * Join three groups back into a code
 */
export function joinCode(groups: readonly [number, number, number]): number {
  return groups[0] * 10000 + groups[1] * 100 + groups[2];
}

/**
 * Check that a value is a six-digit code with a non-zero province group
 */
export function isValidCode(code: number): boolean {
  return Number.isInteger(code) && code >= 100000 && code <= 999999;
}

/**
 * Administrative level implied by the code's zero groups
 *
 * Codes with a zero province group cannot occur; they fall back to level 1.
 */
export function levelOfCode(code: number): AdminLevel {
  const zeroGroups = splitCode(code).filter((group) => group === 0).length;
  const level = 3 - zeroGroups;
  return isAdminLevel(level) ? level : 1;
}

/**
 * Codes of the enclosing divisions at levels 1, 2 and 3
 */
export function parentCodes(code: number): [number, number, number] {
  return [code - (code % 10000), code - (code % 100), code];
}

/**
 * Code of the immediate parent division, or null for a province
 */
export function immediateParent(code: number, level: AdminLevel): number | null {
  switch (level) {
    case 1:
      return null;
    case 2:
      return code - (code % 10000);
    case 3:
      return code - (code % 100);
  }
}

/**
 * Prefix shared by all siblings of a division
 *
 * Level 3 siblings share four digits, level 2 siblings two, and all
 * provinces share the empty prefix.
 */
export function parentPrefix(code: number, level: AdminLevel): string {
  const text = String(code).padStart(6, '0');
  switch (level) {
    case 1:
      return '';
    case 2:
      return text.slice(0, 2);
    case 3:
      return text.slice(0, 4);
  }
}

/**
 * Per-field source priority
 *
 * The merge engine takes the first present value in a field's order.
 * The table is configuration: a config file may override any field,
 * but code, name and level must stay with the scraped listing first.
 *
 * @module merge/priority
 */

import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import type { RegionField, SourceId } from '../core/types.js';

export type FieldPriorityTable = Readonly<Record<RegionField, readonly SourceId[]>>;

export const DEFAULT_PRIORITY: FieldPriorityTable = {
  code: ['scraped', 'standard', 'historical'],
  nameZh: ['scraped', 'standard', 'historical'],
  level: ['scraped', 'standard', 'historical'],
  namePinyin: ['historical', 'standard'],
  alpha: ['historical', 'standard'],
  nameEn: ['standard'],
  latitude: ['standard'],
  longitude: ['standard'],
};

export const REGION_FIELDS: readonly RegionField[] = [
  'code',
  'nameZh',
  'level',
  'namePinyin',
  'nameEn',
  'alpha',
  'latitude',
  'longitude',
];

const IDENTITY_FIELDS: readonly RegionField[] = ['code', 'nameZh', 'level'];

const SourceOrderSchema = z
  .array(z.enum(['scraped', 'standard', 'historical']))
  .min(1)
  .refine((order) => new Set(order).size === order.length, 'sources must not repeat');

/**
 * Partial override as written in a config file
 */
export const PriorityOverrideSchema = z
  .object({
    code: SourceOrderSchema,
    nameZh: SourceOrderSchema,
    level: SourceOrderSchema,
    namePinyin: SourceOrderSchema,
    nameEn: SourceOrderSchema,
    alpha: SourceOrderSchema,
    latitude: SourceOrderSchema,
    longitude: SourceOrderSchema,
  })
  .partial()
  .strict();

export type PriorityOverride = z.infer<typeof PriorityOverrideSchema>;

/**
 * Apply an override to the default table and check it
 *
 * @throws {ConfigError} when an identity field does not start with scraped
 */
export function resolvePriority(
  override: PriorityOverride = {},
  configPath: string | null = null
): FieldPriorityTable {
  const table: FieldPriorityTable = {
    code: override.code ?? DEFAULT_PRIORITY.code,
    nameZh: override.nameZh ?? DEFAULT_PRIORITY.nameZh,
    level: override.level ?? DEFAULT_PRIORITY.level,
    namePinyin: override.namePinyin ?? DEFAULT_PRIORITY.namePinyin,
    nameEn: override.nameEn ?? DEFAULT_PRIORITY.nameEn,
    alpha: override.alpha ?? DEFAULT_PRIORITY.alpha,
    latitude: override.latitude ?? DEFAULT_PRIORITY.latitude,
    longitude: override.longitude ?? DEFAULT_PRIORITY.longitude,
  };

  for (const field of IDENTITY_FIELDS) {
    if (table[field][0] !== 'scraped') {
      throw new ConfigError(`priority.${field} must list scraped first`, configPath);
    }
  }

  return table;
}

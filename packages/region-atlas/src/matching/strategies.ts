/**
 * Matching strategies
 *
 * Each strategy is one pass over the candidates still pending. It reads
 * an immutable context and the set of scraped codes already claimed, and
 * returns the pairs it is sure of. Pairs within one pass never share a
 * scraped record; the matcher applies them between passes.
 *
 * @module matching/strategies
 */

import { parentPrefix } from '../core/codes.js';
import type { CandidateRecord, RegionRecord } from '../core/types.js';
import { normalizeName, type VariantTable } from './normalize.js';

// ============================================================================
// Types
// ============================================================================

export interface MatchContext {
  /** Scraped records in document order */
  readonly scraped: readonly RegionRecord[];
  readonly scrapedByCode: ReadonlyMap<number, RegionRecord>;
  readonly variants: VariantTable;
}

export interface MatchPair {
  readonly candidate: CandidateRecord;
  readonly scraped: RegionRecord;
  readonly strategy: string;
}

export interface MatchStrategy {
  readonly name: string;
  match(
    pending: readonly CandidateRecord[],
    claimed: ReadonlySet<number>,
    context: MatchContext
  ): MatchPair[];
}

/**
 * Build a context over the scraped records
 */
export function createMatchContext(
  scraped: readonly RegionRecord[],
  variants: VariantTable
): MatchContext {
  return {
    scraped,
    scrapedByCode: new Map(scraped.map((record) => [record.code, record])),
    variants,
  };
}

// ============================================================================
// Grouping
// ============================================================================

/**
 * Siblings with the same comparable name share a key
 */
export function groupKey(
  level: number,
  prefix: string,
  nameZh: string,
  variants: VariantTable
): string {
  return `${level}|${prefix}|${normalizeName(nameZh, variants)}`;
}

export function scrapedKey(record: RegionRecord, variants: VariantTable): string {
  return groupKey(record.level, parentPrefix(record.code, record.level), record.nameZh, variants);
}

export function candidateKey(record: CandidateRecord, variants: VariantTable): string {
  return groupKey(record.level, record.parentPrefix, record.nameZh, variants);
}

function pushTo<T>(groups: Map<string, T[]>, key: string, value: T): void {
  const group = groups.get(key);
  if (group) {
    group.push(value);
  } else {
    groups.set(key, [value]);
  }
}

/**
 * Unclaimed scraped records grouped by key, each group in document order
 */
export function groupUnclaimed(
  claimed: ReadonlySet<number>,
  context: MatchContext
): Map<string, RegionRecord[]> {
  const groups = new Map<string, RegionRecord[]>();
  for (const record of context.scraped) {
    if (!claimed.has(record.code)) {
      pushTo(groups, scrapedKey(record, context.variants), record);
    }
  }
  return groups;
}

/**
 * Pending candidates grouped by key, each group in source order
 */
export function groupPending(
  pending: readonly CandidateRecord[],
  variants: VariantTable
): Map<string, CandidateRecord[]> {
  const groups = new Map<string, CandidateRecord[]>();
  const ordered = [...pending].sort((a, b) => a.position - b.position);
  for (const record of ordered) {
    pushTo(groups, candidateKey(record, variants), record);
  }
  return groups;
}

// ============================================================================
// Strategies
// ============================================================================

/**
 * Names refer to the same division when their normalized forms are equal
 * or one contains the other
 */
export function namesAgree(a: string, b: string, variants: VariantTable): boolean {
  const left = normalizeName(a, variants);
  const right = normalizeName(b, variants);
  return left === right || left.includes(right) || right.includes(left);
}

/**
 * Canonical code present in the scraped set under an agreeing name.
 * Codes are reused after a division is abolished, so a code hit with a
 * different name stays pending.
 */
export const exactCodeStrategy: MatchStrategy = {
  name: 'exact-code',
  match(pending, claimed, context) {
    const taken = new Set(claimed);
    const pairs: MatchPair[] = [];

    for (const candidate of pending) {
      if (candidate.code === null || taken.has(candidate.code)) continue;
      const scraped = context.scrapedByCode.get(candidate.code);
      if (!scraped || !namesAgree(candidate.nameZh, scraped.nameZh, context.variants)) continue;

      taken.add(scraped.code);
      pairs.push({ candidate, scraped, strategy: 'exact-code' });
    }

    return pairs;
  },
};

/**
 * One candidate and one scraped record under the same parent, level and
 * normalized name
 */
export const normalizedNameStrategy: MatchStrategy = {
  name: 'normalized-name',
  match(pending, claimed, context) {
    const scrapedGroups = groupUnclaimed(claimed, context);
    const pairs: MatchPair[] = [];

    for (const [key, candidates] of groupPending(pending, context.variants)) {
      const group = scrapedGroups.get(key);
      const candidate = candidates[0];
      const scraped = group?.[0];
      if (candidates.length !== 1 || group?.length !== 1 || !candidate || !scraped) continue;

      pairs.push({ candidate, scraped, strategy: 'normalized-name' });
    }

    return pairs;
  },
};

/**
 * Same-named siblings paired by position when both sides list the same
 * number of them
 */
export const documentOrderStrategy: MatchStrategy = {
  name: 'document-order',
  match(pending, claimed, context) {
    const scrapedGroups = groupUnclaimed(claimed, context);
    const pairs: MatchPair[] = [];

    for (const [key, candidates] of groupPending(pending, context.variants)) {
      const group = scrapedGroups.get(key);
      if (!group || group.length < 2 || group.length !== candidates.length) continue;

      candidates.forEach((candidate, index) => {
        const scraped = group[index];
        if (scraped) {
          pairs.push({ candidate, scraped, strategy: 'document-order' });
        }
      });
    }

    return pairs;
  },
};

export const DEFAULT_STRATEGIES: readonly MatchStrategy[] = [
  exactCodeStrategy,
  normalizedNameStrategy,
  documentOrderStrategy,
];

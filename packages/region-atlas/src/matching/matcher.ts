/**
 * Name Matcher
 *
 * Aligns one non-scraped source against the scraped set by running the
 * strategies in order. A scraped record is claimed at most once per
 * source; whatever is still pending at the end is reported. A pending
 * record whose key is shared by several scraped records, or by other
 * pending records, becomes an ambiguous-match conflict.
 *
 * @module matching/matcher
 */

import type {
  AmbiguousMatchConflict,
  CandidateRecord,
  CandidateSource,
  RegionRecord,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { getDefaultVariants, type VariantTable } from './normalize.js';
import {
  DEFAULT_STRATEGIES,
  candidateKey,
  createMatchContext,
  groupPending,
  groupUnclaimed,
  type MatchContext,
  type MatchStrategy,
} from './strategies.js';

const logger = createLogger({ module: 'matcher' });

export interface MatchOptions {
  readonly strategies?: readonly MatchStrategy[];
  readonly variants?: VariantTable;
}

export interface MatchResult {
  /** Matched candidate keyed by scraped code */
  readonly matches: ReadonlyMap<number, CandidateRecord>;
  /** Candidates no strategy could place, in source order */
  readonly unmatched: readonly CandidateRecord[];
  readonly conflicts: readonly AmbiguousMatchConflict[];
  /** Number of matches made by each strategy */
  readonly byStrategy: Readonly<Record<string, number>>;
}

/**
 * Match candidates from one source against the scraped records
 */
export function matchRecords(
  scraped: readonly RegionRecord[],
  candidates: readonly CandidateRecord[],
  options: MatchOptions = {}
): MatchResult {
  const strategies = options.strategies ?? DEFAULT_STRATEGIES;
  const context = createMatchContext(scraped, options.variants ?? getDefaultVariants());

  const matches = new Map<number, CandidateRecord>();
  const byStrategy: Record<string, number> = {};
  let pending: readonly CandidateRecord[] = candidates;

  for (const strategy of strategies) {
    const pairs = strategy.match(pending, new Set(matches.keys()), context);
    const placed = new Set<CandidateRecord>();

    for (const pair of pairs) {
      if (matches.has(pair.scraped.code)) {
        throw new Error(`Strategy ${strategy.name} claimed ${pair.scraped.code} twice`);
      }
      matches.set(pair.scraped.code, pair.candidate);
      placed.add(pair.candidate);
    }

    byStrategy[strategy.name] = pairs.length;
    pending = pending.filter((candidate) => !placed.has(candidate));
  }

  const conflicts = findAmbiguities(pending, new Set(matches.keys()), context);
  const unmatched = [...pending].sort((a, b) => a.position - b.position);

  const source: CandidateSource | undefined = candidates[0]?.source;
  logger.info('Matched source records', {
    source,
    candidates: candidates.length,
    matched: matches.size,
    unmatched: unmatched.length,
    ambiguous: conflicts.length,
    ...byStrategy,
  });

  for (const conflict of conflicts) {
    logger.warn('Ambiguous match', {
      source: conflict.source,
      sourceKey: conflict.sourceKey,
      nameZh: conflict.nameZh,
      candidates: conflict.candidates,
    });
  }

  return { matches, unmatched, conflicts, byStrategy };
}

function findAmbiguities(
  pending: readonly CandidateRecord[],
  claimed: ReadonlySet<number>,
  context: MatchContext
): AmbiguousMatchConflict[] {
  const scrapedGroups = groupUnclaimed(claimed, context);
  const pendingGroups = groupPending(pending, context.variants);
  const conflicts: AmbiguousMatchConflict[] = [];

  for (const candidate of pending) {
    const key = candidateKey(candidate, context.variants);
    const group = scrapedGroups.get(key);
    const rivals = pendingGroups.get(key)?.length ?? 0;
    if (!group || (group.length < 2 && rivals < 2)) continue;

    conflicts.push({
      kind: 'ambiguous-match',
      source: candidate.source,
      sourceKey: candidate.sourceKey,
      nameZh: candidate.nameZh,
      candidates: group.map((record) => record.code),
    });
  }

  return conflicts;
}

/**
 * Priority-Tiered Selector
 *
 * High-priority items are always kept (in input order); the remaining
 * slots are filled from medium, low and unset items, ranked externally only
 * when they do not all fit.
 */

import { loggers } from '../../shared/logging/logger';
import { rankPool } from './rankingAdapter';
import type { CandidateDescriptor, PriorityTier, RankableItem, TailorContext } from '../types';

const log = loggers.selector;

/**
 * Group items by priority tier, preserving input order within each tier
 */
export function partitionByPriority<T extends RankableItem>(items: T[]): Record<PriorityTier, T[]> {
  const tiers: Record<PriorityTier, T[]> = { high: [], medium: [], low: [], unset: [] };
  for (const item of items) {
    tiers[item.priority ?? 'unset'].push(item);
  }
  return tiers;
}

/**
 * Select at most maxCount items
 *
 * Collections that already fit are returned as given, with no service call.
 */
export async function selectItems<T extends RankableItem>(
  items: T[],
  maxCount: number,
  descriptor: CandidateDescriptor<T>,
  context: TailorContext
): Promise<T[]> {
  if (items.length <= maxCount) {
    return items;
  }

  const tiers = partitionByPriority(items);
  const kept = tiers.high;

  if (kept.length >= maxCount) {
    log.info(
      { candidates: descriptor.plural, high: kept.length, maxCount },
      'High-priority items fill every slot'
    );
    return kept.slice(0, maxCount);
  }

  const remainingSlots = maxCount - kept.length;
  const pool = [...tiers.medium, ...tiers.low, ...tiers.unset];

  if (pool.length <= remainingSlots) {
    return [...kept, ...pool];
  }

  log.info(
    { candidates: descriptor.plural, high: kept.length, pool: pool.length, remainingSlots },
    'Ranking remaining candidates'
  );

  const ranked = await rankPool(pool, remainingSlots, descriptor, context);
  return [...kept, ...ranked].slice(0, maxCount);
}

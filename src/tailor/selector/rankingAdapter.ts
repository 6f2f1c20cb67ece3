/**
 * External Ranking Adapter
 *
 * Asks the text-generation service to order a pool of candidates and turns
 * its reply into exactly `slots` pool items. Any failure (service error,
 * non-JSON reply, non-list reply) yields pool.slice(0, slots).
 */

import { parseJsonResponse } from '../../shared/llm/parse';
import { loggers } from '../../shared/logging/logger';
import { GracefulDegradation } from '../errors/gracefulDegradation';
import type { ParseResult } from '../../shared/llm/types';
import { RankingReplySchema } from '../validation/schemas';
import { buildRankingPrompt } from './prompts';
import type { CandidateDescriptor, TailorContext } from '../types';

const log = loggers.ranking;

export const RANKING_TEMPERATURE = 0.1;
export const RANKING_MAX_TOKENS = 100;

/**
 * Map a parsed reply onto pool items.
 *
 * Entries that are not integers in [1, pool.length] are dropped, repeats
 * count once, and unselected pool items pad the result in pool order.
 */
export function resolveRankedItems<T>(reply: unknown[], pool: T[], slots: number): T[] {
  const chosen: number[] = [];

  for (const entry of reply) {
    if (
      typeof entry === 'number' &&
      Number.isInteger(entry) &&
      entry >= 1 &&
      entry <= pool.length &&
      !chosen.includes(entry - 1)
    ) {
      chosen.push(entry - 1);
    }
  }

  for (let i = 0; i < pool.length && chosen.length < slots; i++) {
    if (!chosen.includes(i)) {
      chosen.push(i);
    }
  }

  return chosen.slice(0, slots).map(i => pool[i]);
}

/**
 * Rank a pool and return the best `slots` items, most relevant first
 */
export async function rankPool<T>(
  pool: T[],
  slots: number,
  descriptor: CandidateDescriptor<T>,
  context: TailorContext
): Promise<T[]> {
  const fallback = (): T[] => pool.slice(0, Math.max(0, slots));

  if (slots <= 0) {
    return [];
  }

  const service = context.service;
  if (!service) {
    log.debug({ candidates: descriptor.plural, slots }, 'Dry run: keeping pool order');
    return fallback();
  }

  const { prompt, systemPrompt } = buildRankingPrompt(pool, slots, descriptor, context.jobDescription);

  return GracefulDegradation.withFallback(
    async (): Promise<ParseResult<T[]>> => {
      const response = await service.complete({
        messages: [{ role: 'user', content: prompt }],
        systemPrompt,
        temperature: RANKING_TEMPERATURE,
        maxTokens: RANKING_MAX_TOKENS
      });

      const reply = parseJsonResponse(response.content, RankingReplySchema);
      if (!reply.ok) {
        return reply;
      }

      const ranked = resolveRankedItems(reply.value, pool, slots);
      log.info(
        { candidates: descriptor.plural, pool: pool.length, slots, selected: ranked.map(descriptor.identify) },
        'Pool ranked'
      );
      return { ok: true, value: ranked };
    },
    fallback,
    `rank_${descriptor.plural}`,
    log
  );
}

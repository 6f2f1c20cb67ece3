/**
 * Skill Category Filter
 *
 * Each category (languages, technologies, concepts) is trimmed to its budget
 * independently. There are no priorities; every skill is a candidate, and
 * only verbatim members of the original list survive a reply.
 */

import { parseJsonResponse } from '../../shared/llm/parse';
import { loggers } from '../../shared/logging/logger';
import { GracefulDegradation } from '../errors/gracefulDegradation';
import { SKILL_CATEGORIES, SkillReplySchema } from '../validation/schemas';
import { buildSkillsPrompt } from './prompts';
import type { SkillCategory, SkillSet, TailorContext } from '../types';
import type { ParseResult, TextGenerationService } from '../../shared/llm/types';

const log = loggers.skills;

export const SKILLS_TEMPERATURE = 0.1;
export const SKILLS_MAX_TOKENS = 200;

/**
 * Keep returned skills that appear verbatim in the category, then pad in original order
 */
export function resolveSkillReply(reply: unknown[], skills: string[], maxCount: number): string[] {
  const selected: string[] = [];

  for (const entry of reply) {
    if (typeof entry === 'string' && skills.includes(entry) && !selected.includes(entry)) {
      selected.push(entry);
    }
  }

  for (const skill of skills) {
    if (selected.length >= maxCount) break;
    if (!selected.includes(skill)) {
      selected.push(skill);
    }
  }

  return selected.slice(0, maxCount);
}

async function rankCategory(
  service: TextGenerationService,
  category: SkillCategory,
  skills: string[],
  maxCount: number,
  jobDescription: string
): Promise<string[]> {
  const { prompt, systemPrompt } = buildSkillsPrompt(category, skills, maxCount, jobDescription);

  return GracefulDegradation.withFallback(
    async (): Promise<ParseResult<string[]>> => {
      const response = await service.complete({
        messages: [{ role: 'user', content: prompt }],
        systemPrompt,
        temperature: SKILLS_TEMPERATURE,
        maxTokens: SKILLS_MAX_TOKENS
      });

      const reply = parseJsonResponse(response.content, SkillReplySchema);
      return reply.ok ? { ok: true, value: resolveSkillReply(reply.value, skills, maxCount) } : reply;
    },
    () => skills.slice(0, maxCount),
    `filter_${category}`,
    log
  );
}

/**
 * Filter every skill category to at most maxPerCategory entries
 *
 * Absent categories produce no entry.
 */
export async function filterSkills(
  skills: SkillSet,
  maxPerCategory: number,
  context: TailorContext
): Promise<SkillSet> {
  const filtered: SkillSet = {};
  let calls = 0;

  for (const category of SKILL_CATEGORIES) {
    const list = skills[category];
    if (!list) {
      continue;
    }

    if (list.length <= maxPerCategory) {
      filtered[category] = list;
    } else if (maxPerCategory <= 0) {
      filtered[category] = [];
    } else if (!context.service) {
      filtered[category] = list.slice(0, maxPerCategory);
    } else {
      if (calls > 0) {
        await context.sleep(context.delays.skillsMs);
      }
      calls++;
      filtered[category] = await rankCategory(
        context.service,
        category,
        list,
        maxPerCategory,
        context.jobDescription
      );
    }

    log.info({ category, before: list.length, after: filtered[category]?.length }, 'Skill category filtered');
  }

  return filtered;
}

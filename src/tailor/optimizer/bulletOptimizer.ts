/**
 * Bullet Optimizer
 *
 * Rewrites one bullet list through the text-generation service. The reply
 * is accepted only when it holds exactly as many bullets as the input;
 * otherwise, or on any service failure, the original bullets come back.
 */

import { loggers } from '../../shared/logging/logger';
import { truncateText } from '../../shared/llm/prompts';
import { GracefulDegradation } from '../errors/gracefulDegradation';
import type { ParseResult } from '../../shared/llm/types';
import { buildOptimizePrompt, OPTIMIZE_SYSTEM_PROMPT } from './prompts';
import type { Priority, TailorContext } from '../types';

const log = loggers.optimizer;

export const OPTIMIZER_TEMPERATURE = 0.3;
export const OPTIMIZER_MAX_TOKENS = 1000;

const BULLET_MARKERS = ['•', '-', '*'];

/**
 * Read bullets out of a reply: only lines starting with a bullet marker
 * count, the marker is stripped, and empty bullets are dropped
 */
export function parseBulletLines(text: string): string[] {
  const bullets: string[] = [];

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (!BULLET_MARKERS.some(marker => line.startsWith(marker))) {
      continue;
    }
    const bullet = line.slice(1).trim();
    if (bullet) {
      bullets.push(bullet);
    }
  }

  return bullets;
}

export interface OptimizeBulletsOptions {
  /** Where the bullets come from, e.g. "Experience at Acme as Engineer" */
  context: string;
  concise: boolean;
  priority?: Priority;
}

/**
 * Optimize a bullet list; the result always has bullets.length entries
 */
export async function optimizeBullets(
  bullets: string[],
  options: OptimizeBulletsOptions,
  tailor: TailorContext
): Promise<string[]> {
  const original = (): string[] => [...bullets];
  const service = tailor.service;

  if (bullets.length === 0 || !service) {
    return original();
  }

  const prompt = buildOptimizePrompt({
    bullets,
    jobDescription: tailor.jobDescription,
    context: options.context,
    concise: options.concise,
    priority: options.priority
  });

  return GracefulDegradation.withFallback(
    async (): Promise<ParseResult<string[]>> => {
      const response = await service.complete({
        messages: [{ role: 'user', content: prompt }],
        systemPrompt: OPTIMIZE_SYSTEM_PROMPT,
        temperature: OPTIMIZER_TEMPERATURE,
        maxTokens: OPTIMIZER_MAX_TOKENS
      });

      const optimized = parseBulletLines(response.content);
      if (optimized.length !== bullets.length) {
        return {
          ok: false,
          reason: `Expected ${bullets.length} bullets, got ${optimized.length}. Preview: ${truncateText(response.content, 200)}`
        };
      }

      return { ok: true, value: optimized };
    },
    original,
    'optimize_bullets',
    log
  );
}

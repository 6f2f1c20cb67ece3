/**
 * Cover Letter Synthesizer
 *
 * Drafts intro, body paragraphs and closing from the optimized resume.
 * A draft missing any of its five fields is rejected as a whole and the
 * fixed fallback draft is used instead.
 */

import { parseJsonResponse } from '../../shared/llm/parse';
import { loggers } from '../../shared/logging/logger';
import { GracefulDegradation } from '../errors/gracefulDegradation';
import type { ParseResult } from '../../shared/llm/types';
import { CoverLetterDraftSchema } from '../validation/schemas';
import { buildCoverLetterPrompt, COVER_LETTER_SYSTEM_PROMPT } from './prompts';
import type { CoverLetterDraft, ResumeDocument, TailorContext } from '../types';

const log = loggers.coverLetter;

export const COVER_LETTER_TEMPERATURE = 0.7;
export const COVER_LETTER_MAX_TOKENS = 1000;

export const DEFAULT_RECIPIENT = 'Hiring Manager';
const DEFAULT_ROLE = 'Software Engineer';
const DEFAULT_BACKGROUND = 'software development';

/**
 * Summarize the resume for the prompt: top 2 experiences with 2 bullets
 * each, top 2 projects with their first bullet
 */
export function buildResumeExcerpt(document: ResumeDocument): string {
  const lines = [`Name: ${document.personal_info.name}`];

  if (document.experience.length > 0) {
    lines.push('', 'Key Experiences:');
    for (const exp of document.experience.slice(0, 2)) {
      lines.push(`- ${exp.role} at ${exp.company}`);
      for (const bullet of (exp.bullets ?? []).slice(0, 2)) {
        lines.push(`  • ${bullet}`);
      }
    }
  }

  if (document.projects.length > 0) {
    lines.push('', 'Key Projects:');
    for (const proj of document.projects.slice(0, 2)) {
      lines.push(`- ${proj.name}`);
      for (const bullet of (proj.bullets ?? []).slice(0, 1)) {
        lines.push(`  • ${bullet}`);
      }
    }
  }

  return lines.join('\n');
}

/**
 * Deterministic draft built from local data only
 */
export function buildFallbackDraft(document: ResumeDocument, companyName?: string): CoverLetterDraft {
  const technologies = (document.skills.technologies ?? []).slice(0, 3);
  const background = technologies.length > 0 ? technologies.join(', ') : DEFAULT_BACKGROUND;
  const role = document.experience[0]?.role || DEFAULT_ROLE;

  return {
    intro: 'I am writing to express my strong interest in the position described in your job posting.',
    body_paragraphs: [
      `With my background in ${background}, I am confident I would be a valuable addition to your team.`,
      `In my recent role as ${role}, I have developed skills that directly align with your requirements.`
    ],
    closing: 'I would welcome the opportunity to discuss how my experience and enthusiasm can contribute to your team\'s success.',
    company_name: companyName || DEFAULT_RECIPIENT,
    recipient_name: DEFAULT_RECIPIENT
  };
}

export interface SynthesizeOptions {
  companyName?: string;
}

/**
 * Draft a cover letter; never returns a partial draft
 */
export async function synthesizeCoverLetter(
  document: ResumeDocument,
  options: SynthesizeOptions,
  context: TailorContext
): Promise<CoverLetterDraft> {
  const fallback = (): CoverLetterDraft => buildFallbackDraft(document, options.companyName);
  const service = context.service;

  if (!service) {
    log.info('Dry run: using fallback cover letter');
    return fallback();
  }

  const prompt = buildCoverLetterPrompt(
    buildResumeExcerpt(document),
    context.jobDescription,
    options.companyName || 'the company'
  );

  return GracefulDegradation.withFallback(
    async (): Promise<ParseResult<CoverLetterDraft>> => {
      const response = await service.complete({
        messages: [{ role: 'user', content: prompt }],
        systemPrompt: COVER_LETTER_SYSTEM_PROMPT,
        temperature: COVER_LETTER_TEMPERATURE,
        maxTokens: COVER_LETTER_MAX_TOKENS,
        jsonObject: true
      });

      const draft = parseJsonResponse(response.content, CoverLetterDraftSchema);
      if (draft.ok) {
        log.info(
          { paragraphs: draft.value.body_paragraphs.length, company: draft.value.company_name },
          'Cover letter drafted'
        );
      }
      return draft;
    },
    fallback,
    'synthesize_cover_letter',
    log
  );
}

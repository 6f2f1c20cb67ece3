/**
 * Optimization Prompts
 */

import { fillPrompt, formatList } from '../../shared/llm/prompts';
import type { Priority } from '../types';

const OPTIMIZE_PROMPT = `You are helping optimize resume bullet points for a specific job application.

JOB DESCRIPTION:
{jobDescription}

CONTEXT: {context}{priorityNote}

ORIGINAL BULLET POINTS:
{bullets}

INSTRUCTIONS:
1. Make MINOR tweaks to better align these bullet points with the job description
2. KEEP BULLET POINTS CONCISE - aim for 1-2 lines maximum per bullet point
3. DO NOT rewrite the bullet points completely - preserve the original meaning and achievements
4. You may:
   - Adjust terminology to match job description language
   - Emphasize relevant skills/technologies mentioned in the job posting
   - Remove unnecessary words while preserving impact
   - Add relevant keywords naturally but concisely
5. DO NOT:
   - Change the core accomplishments or facts
   - Add false information
   - Make bullet points longer than the original
   - Change the number of bullet points

CRITICAL: Keep each bullet point under {lengthTarget} when possible. Focus on impact over verbosity.
{conciseNote}

Return ONLY the optimized bullet points in the same format, one per line with bullet symbols.`;

export const OPTIMIZE_SYSTEM_PROMPT =
  'You are a professional resume writer who makes subtle, targeted improvements to align resume content with job requirements.';

const PRIORITY_NOTES: Record<Priority, string> = {
  high: 'This should always be included and represents a key strength, so ensure optimization maintains strong impact.',
  medium: 'This is moderately important and should be optimized for relevance to the job description.',
  low: 'This is lower priority and should be optimized to maximize relevance to justify its inclusion.'
};

const CONCISE_NOTE =
  'EXTRA CONCISE MODE: Remove all unnecessary words. Use strong action verbs. Aim for maximum impact in minimum words.';

export interface OptimizePromptInput {
  bullets: string[];
  jobDescription: string;
  context: string;
  concise: boolean;
  priority?: Priority;
}

export function buildOptimizePrompt(input: OptimizePromptInput): string {
  const priorityNote = input.priority
    ? `\n\nNOTE: This is a ${input.priority} priority item. ${PRIORITY_NOTES[input.priority]}`
    : '';

  return fillPrompt(OPTIMIZE_PROMPT, {
    jobDescription: input.jobDescription,
    context: input.context,
    priorityNote,
    bullets: formatList(input.bullets),
    lengthTarget: input.concise ? '80 characters' : '120 characters',
    conciseNote: input.concise ? CONCISE_NOTE : ''
  });
}

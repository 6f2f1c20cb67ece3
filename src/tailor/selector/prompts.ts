/**
 * Selection Prompts
 *
 * Prompt templates for ranking experiences, projects and skills, and the
 * descriptors that turn a candidate into prompt lines.
 */

import { fillPrompt, formatList } from '../../shared/llm/prompts';
import type { CandidateDescriptor, Experience, Project, SkillCategory } from '../types';

// ============================================================================
// Templates
// ============================================================================

const RANKING_PROMPT = `You are a career counselor helping to select the most relevant {plural} for a specific job application.

NOTE: High priority {plural} have already been selected. You are choosing from the remaining {plural}.

JOB DESCRIPTION:
{jobDescription}

AVAILABLE {pluralUpper} (remaining {slots} slots):
{candidates}

TASK: Select the {slots} most relevant {plural} for this job application. Consider:
{criteria}

Return ONLY a JSON array with the {singular} numbers (1-based) in order of relevance.
Example format: [1, 3, 2]

Do not include any explanation, just the JSON array.`;

const RANKING_SYSTEM_PROMPT = 'You are a professional career counselor who selects the most relevant {plural} for job applications. Always respond with only a JSON array of numbers.';

const SKILLS_PROMPT = `You are a career counselor helping to select the most relevant skills for a specific job application.

JOB DESCRIPTION:
{jobDescription}

SKILL CATEGORY: {categoryTitle}
AVAILABLE SKILLS: {skills}

TASK: Select the {maxCount} most relevant {category} for this job application. Consider:
1. Direct mentions in the job description
2. Related/complementary technologies
3. Industry standard requirements
4. Transferable skills value

Return ONLY a JSON array with the exact skill names from the list above.
Example format: ["Python", "JavaScript", "React"]

Do not include any explanation, just the JSON array.`;

const SKILLS_SYSTEM_PROMPT = 'You are a professional career counselor who selects the most relevant {category} for job applications. Always respond with only a JSON array of skill names.';

// ============================================================================
// Candidate Descriptors
// ============================================================================

function priorityNote(priority: string | undefined): string {
  return ` [Priority: ${priority ?? 'unset'}]`;
}

export const EXPERIENCE_DESCRIPTOR: CandidateDescriptor<Experience> = {
  label: 'Experience',
  plural: 'experiences',
  describe: exp => [
    `Company: ${exp.company}`,
    `Role: ${exp.role}`,
    `Duration: ${exp.start_date ?? ''} - ${exp.end_date ?? ''}${priorityNote(exp.priority)}`,
    'Key achievements:',
    formatList(exp.bullets ?? [])
  ],
  identify: exp => `${exp.company}: ${exp.role}`,
  criteria: [
    'Technical skills alignment',
    'Industry relevance',
    'Role responsibilities match',
    'Seniority level appropriateness',
    'Transferable skills',
    'Priority level (medium priority experiences are preferred over low priority when relevance is similar)'
  ]
};

export const PROJECT_DESCRIPTOR: CandidateDescriptor<Project> = {
  label: 'Project',
  plural: 'projects',
  describe: proj => [
    `Name: ${proj.name}`,
    `Technologies: ${(proj.tech ?? []).join(', ')}${priorityNote(proj.priority)}`,
    'Description:',
    formatList(proj.bullets ?? [])
  ],
  identify: proj => proj.name,
  criteria: [
    'Technology stack alignment',
    'Project complexity and scope',
    'Relevant problem-solving approaches',
    'Demonstrable skills',
    'Industry relevance',
    'Priority level (medium priority projects are preferred over low priority when relevance is similar)'
  ]
};

// ============================================================================
// Prompt Builders
// ============================================================================

/**
 * Build the ranking prompt; candidates are numbered from 1
 */
export function buildRankingPrompt<T>(
  pool: T[],
  slots: number,
  descriptor: CandidateDescriptor<T>,
  jobDescription: string
): { prompt: string; systemPrompt: string } {
  const candidates = pool
    .map((item, i) => [`${descriptor.label} ${i + 1}:`, ...descriptor.describe(item)]
      .filter(line => line.length > 0)
      .join('\n'))
    .join('\n\n');

  return {
    prompt: fillPrompt(RANKING_PROMPT, {
      plural: descriptor.plural,
      pluralUpper: descriptor.plural.toUpperCase(),
      singular: descriptor.label.toLowerCase(),
      jobDescription,
      slots: String(slots),
      candidates,
      criteria: descriptor.criteria.map((criterion, i) => `${i + 1}. ${criterion}`).join('\n')
    }),
    systemPrompt: fillPrompt(RANKING_SYSTEM_PROMPT, { plural: descriptor.plural })
  };
}

/**
 * Build the prompt for one skill category
 */
export function buildSkillsPrompt(
  category: SkillCategory,
  skills: string[],
  maxCount: number,
  jobDescription: string
): { prompt: string; systemPrompt: string } {
  return {
    prompt: fillPrompt(SKILLS_PROMPT, {
      jobDescription,
      category,
      categoryTitle: category.charAt(0).toUpperCase() + category.slice(1),
      skills: skills.join(', '),
      maxCount: String(maxCount)
    }),
    systemPrompt: fillPrompt(SKILLS_SYSTEM_PROMPT, { category })
  };
}

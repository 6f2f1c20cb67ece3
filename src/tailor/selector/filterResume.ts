/**
 * Relevance Filter (stage 1)
 *
 * Applies the experience and project selectors and the skill filter to the
 * loaded corpus. Personal info and education pass through unchanged.
 */

import { loggers } from '../../shared/logging/logger';
import { selectItems } from './prioritySelector';
import { filterSkills } from './skillFilter';
import { EXPERIENCE_DESCRIPTOR, PROJECT_DESCRIPTOR } from './prompts';
import type { ResumeDocument, SlotBudgets, TailorContext } from '../types';

const log = loggers.selector;

export async function filterResume(
  document: ResumeDocument,
  budgets: SlotBudgets,
  context: TailorContext
): Promise<ResumeDocument> {
  const experience = await selectItems(
    document.experience,
    budgets.maxExperiences,
    EXPERIENCE_DESCRIPTOR,
    context
  );
  log.info(
    {
      before: document.experience.length,
      after: experience.length,
      selected: experience.map(EXPERIENCE_DESCRIPTOR.identify)
    },
    'Experiences selected'
  );

  const projects = await selectItems(
    document.projects,
    budgets.maxProjects,
    PROJECT_DESCRIPTOR,
    context
  );
  log.info(
    {
      before: document.projects.length,
      after: projects.length,
      selected: projects.map(PROJECT_DESCRIPTOR.identify)
    },
    'Projects selected'
  );

  const skills = await filterSkills(document.skills, budgets.maxSkillsPerCategory, context);

  return {
    personal_info: document.personal_info,
    education: document.education,
    experience,
    projects,
    skills
  };
}

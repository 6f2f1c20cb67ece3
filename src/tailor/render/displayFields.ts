/**
 * Display Fields
 *
 * Prepares a resume document for the LaTeX templates: escapes special
 * characters in bullets and adds the comma-joined *_display fields the
 * templates print.
 */

import type { Education, Experience, PersonalInfo, Project, ResumeDocument, SkillSet } from '../types';

const LATEX_REPLACEMENTS: Record<string, string> = {
  '\\': '\\textbackslash{}',
  '$': '\\$',
  '%': '\\%',
  '&': '\\&',
  '#': '\\#',
  '_': '\\_',
  '{': '\\{',
  '}': '\\}',
  '^': '\\textasciicircum{}',
  '~': '\\textasciitilde{}'
};

/**
 * Escape LaTeX special characters in one pass, so inserted braces stay as written
 */
export function escapeLatex(text: string): string {
  return text.replace(/[\\$%&#_{}^~]/g, char => LATEX_REPLACEMENTS[char] ?? char);
}

function joinDisplay(items: string[]): string {
  return escapeLatex(items.join(', '));
}

export interface DisplayData {
  personal_info: PersonalInfo;
  education: Array<Education & { coursework_display?: string }>;
  experience: Experience[];
  projects: Array<Project & { tech_display?: string }>;
  skills: SkillSet & {
    languages_display?: string;
    technologies_display?: string;
    concepts_display?: string;
  };
}

/**
 * Build the template view; the input document is left untouched
 */
export function prepareDisplayData(document: ResumeDocument): DisplayData {
  const data = structuredClone(document);
  const { skills } = data;

  return {
    personal_info: data.personal_info,
    education: data.education.map(edu => ({
      ...edu,
      ...(edu.relevant_coursework ? { coursework_display: joinDisplay(edu.relevant_coursework) } : {})
    })),
    experience: data.experience.map(exp => ({
      ...exp,
      ...(exp.bullets ? { bullets: exp.bullets.map(escapeLatex) } : {})
    })),
    projects: data.projects.map(proj => ({
      ...proj,
      ...(proj.tech ? { tech_display: joinDisplay(proj.tech) } : {}),
      ...(proj.bullets ? { bullets: proj.bullets.map(escapeLatex) } : {})
    })),
    skills: {
      ...skills,
      ...(skills.languages ? { languages_display: joinDisplay(skills.languages) } : {}),
      ...(skills.technologies ? { technologies_display: joinDisplay(skills.technologies) } : {}),
      ...(skills.concepts ? { concepts_display: joinDisplay(skills.concepts) } : {})
    }
  };
}

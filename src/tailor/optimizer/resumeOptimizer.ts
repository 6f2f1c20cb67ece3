/**
 * Resume Optimizer (stage 2)
 *
 * Walks experiences, then projects, optimizing each entry's bullets with one
 * service call per entry. New entries are built; inputs are never mutated.
 * Personal info, education and skills pass through unchanged.
 */

import { loggers } from '../../shared/logging/logger';
import { optimizeBullets } from './bulletOptimizer';
import type { Experience, Project, ResumeDocument, TailorContext } from '../types';

const log = loggers.optimizer;

export interface OptimizeResumeOptions {
  concise: boolean;
}

export function experienceContext(exp: Experience): string {
  return `Experience at ${exp.company} as ${exp.role}`;
}

export function projectContext(proj: Project): string {
  return `Project: ${proj.name} using ${(proj.tech ?? []).join(', ')}`;
}

export async function optimizeResume(
  document: ResumeDocument,
  options: OptimizeResumeOptions,
  context: TailorContext
): Promise<ResumeDocument> {
  let calls = 0;

  // Calls happen one at a time, in load order, spaced for rate limits
  const optimizeEntry = async <T extends Experience | Project>(entry: T, entryContext: string): Promise<T> => {
    if (!entry.bullets || entry.bullets.length === 0) {
      return { ...entry };
    }

    if (context.service) {
      if (calls > 0) {
        await context.sleep(context.delays.optimizerMs);
      }
      calls++;
    }

    const bullets = await optimizeBullets(
      entry.bullets,
      { context: entryContext, concise: options.concise, priority: entry.priority },
      context
    );
    return { ...entry, bullets };
  };

  const experience: Experience[] = [];
  for (const [i, exp] of document.experience.entries()) {
    log.info({ entry: `${i + 1}/${document.experience.length}`, company: exp.company }, 'Optimizing experience');
    experience.push(await optimizeEntry(exp, experienceContext(exp)));
  }

  const projects: Project[] = [];
  for (const [i, proj] of document.projects.entries()) {
    log.info({ entry: `${i + 1}/${document.projects.length}`, project: proj.name }, 'Optimizing project');
    projects.push(await optimizeEntry(proj, projectContext(proj)));
  }

  return {
    personal_info: document.personal_info,
    education: document.education,
    experience,
    projects,
    skills: document.skills
  };
}

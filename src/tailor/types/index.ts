/**
 * Tailor Type Definitions
 *
 * Document types are inferred from the zod schemas so the shape checked at
 * load time and the shape used in code cannot drift apart.
 */

import type { z } from 'zod';
import type { TextGenerationService } from '../../shared/llm/types';
import type {
  PrioritySchema,
  PersonalInfoSchema,
  EducationSchema,
  ExperienceSchema,
  ProjectSchema,
  SkillSetSchema,
  ResumeDocumentSchema,
  CoverLetterDraftSchema,
  SKILL_CATEGORIES
} from '../validation/schemas';

// ============================================================================
// Corpus Types
// ============================================================================

export type Priority = z.infer<typeof PrioritySchema>;

/**
 * Priority tier an item falls into; items without a priority are 'unset'
 */
export type PriorityTier = Priority | 'unset';

export type PersonalInfo = z.infer<typeof PersonalInfoSchema>;
export type Education = z.infer<typeof EducationSchema>;
export type Experience = z.infer<typeof ExperienceSchema>;
export type Project = z.infer<typeof ProjectSchema>;
export type SkillSet = z.infer<typeof SkillSetSchema>;
export type SkillCategory = typeof SKILL_CATEGORIES[number];

/**
 * Full resume document: the loaded corpus, and every stage artifact
 */
export type ResumeDocument = z.infer<typeof ResumeDocumentSchema>;

/**
 * Anything the selector can rank: it may declare a priority
 */
export interface RankableItem {
  priority?: Priority;
}

// ============================================================================
// Selection Types
// ============================================================================

/**
 * Slot budgets per collection
 */
export interface SlotBudgets {
  maxExperiences: number;
  maxProjects: number;
  maxSkillsPerCategory: number;
}

/**
 * How a collection of candidates is described to the ranking service
 */
export interface CandidateDescriptor<T> {
  /** Singular label, e.g. "Experience" */
  label: string;
  /** Plural label, e.g. "experiences" */
  plural: string;
  /** Lines describing one candidate (without its number) */
  describe(item: T): string[];
  /** Short identity for logs */
  identify(item: T): string;
  /** What the service should weigh, most important first */
  criteria: string[];
}

/**
 * Delays inserted between consecutive service calls
 */
export interface RequestDelays {
  skillsMs: number;
  optimizerMs: number;
}

/**
 * Everything a stage needs to talk to the text-generation service.
 * An absent service means dry-run: every component takes its fallback path.
 */
export interface TailorContext {
  jobDescription: string;
  service?: TextGenerationService;
  delays: RequestDelays;
  sleep: (ms: number) => Promise<void>;
}

// ============================================================================
// Cover Letter Types
// ============================================================================

export type CoverLetterDraft = z.infer<typeof CoverLetterDraftSchema>;

/**
 * Tailor Validation Schemas
 *
 * Zod schemas for the source corpus, stage artifacts and service replies.
 * Corpus entries pass unknown fields through so templates can use them.
 */

import { z } from 'zod';

// ============================================================================
// Corpus Schemas
// ============================================================================

/**
 * Declared importance of an experience or project. Absent means unset.
 */
export const PrioritySchema = z.enum(['high', 'medium', 'low']);

export const SKILL_CATEGORIES = ['languages', 'technologies', 'concepts'] as const;

export const PersonalInfoSchema = z.object({
  name: z.string().min(1, 'Name is required'),
  email: z.string().optional(),
  phone: z.string().optional(),
  location: z.string().optional(),
  linkedin: z.string().optional(),
  github: z.string().optional(),
  website: z.string().optional()
}).passthrough();

export const EducationSchema = z.object({
  institution: z.string().optional(),
  degree: z.string().optional(),
  location: z.string().optional(),
  start_date: z.string().optional(),
  end_date: z.string().optional(),
  gpa: z.string().optional(),
  relevant_coursework: z.array(z.string()).optional()
}).passthrough();

export const ExperienceSchema = z.object({
  company: z.string().min(1, 'Company is required'),
  role: z.string().min(1, 'Role is required'),
  location: z.string().optional(),
  start_date: z.string().optional(),
  end_date: z.string().optional(),
  bullets: z.array(z.string()).optional(),
  priority: PrioritySchema.optional()
}).passthrough();

export const ProjectSchema = z.object({
  name: z.string().min(1, 'Project name is required'),
  tech: z.array(z.string()).optional(),
  link: z.string().optional(),
  bullets: z.array(z.string()).optional(),
  priority: PrioritySchema.optional()
}).passthrough();

export const SkillSetSchema = z.object({
  languages: z.array(z.string()).optional(),
  technologies: z.array(z.string()).optional(),
  concepts: z.array(z.string()).optional()
});

// ============================================================================
// Artifact Schemas
// ============================================================================

/**
 * The document handed between stages (and to the renderer)
 */
export const ResumeDocumentSchema = z.object({
  personal_info: PersonalInfoSchema,
  education: z.array(EducationSchema),
  experience: z.array(ExperienceSchema),
  projects: z.array(ProjectSchema),
  skills: SkillSetSchema
});

// ============================================================================
// Service Reply Schemas
// ============================================================================

/**
 * Ranking replies: any JSON array. Entries that are not in-range integers are
 * dropped later, against the size of the pool.
 */
export const RankingReplySchema = z.array(z.unknown());

/**
 * Skill filtering replies: any JSON array; only verbatim category members survive.
 */
export const SkillReplySchema = z.array(z.unknown());

/**
 * Cover letter replies. A single body paragraph string is coerced to a list.
 */
export const CoverLetterDraftSchema = z.object({
  intro: z.string(),
  body_paragraphs: z
    .union([z.array(z.string()), z.string()])
    .transform(value => (typeof value === 'string' ? [value] : value)),
  closing: z.string(),
  company_name: z.string(),
  recipient_name: z.string()
});

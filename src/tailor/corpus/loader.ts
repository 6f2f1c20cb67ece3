/**
 * Corpus Loader
 *
 * Loads the five source documents (personal info, education, experience,
 * projects, skills) into one validated ResumeDocument. Each document may be
 * bare or wrapped under its own key, e.g. {"experience": [...]}.
 */

import * as path from 'path';
import { z } from 'zod';
import type { StorageProvider } from '../../shared/storage/interface';
import { FileStorage } from '../../shared/storage/fileStorage';
import { validateWithSchema } from '../../shared/validation/validator';
import { loggers } from '../../shared/logging/logger';
import { TailorErrorFactory } from '../errors/types';
import {
  PersonalInfoSchema,
  EducationSchema,
  ExperienceSchema,
  ProjectSchema,
  SKILL_CATEGORIES
} from '../validation/schemas';
import type { ResumeDocument, SkillSet } from '../types';

const log = loggers.corpus;

/**
 * File name of each source document inside the source directory
 */
export const CORPUS_FILES = {
  personal_info: 'personal_info.json',
  education: 'education.json',
  experience: 'experience.json',
  projects: 'projects.json',
  skills: 'skills.json'
} as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Return value[key] when the document is wrapped under key, else the document itself
 */
function unwrap(value: unknown, key: string): unknown {
  return isRecord(value) && key in value ? value[key] : value;
}

/**
 * Keep only the skill categories that are lists of strings
 */
export function normalizeSkills(raw: unknown): SkillSet {
  // Flat documents carry the categories at the top level
  const source = isRecord(raw) && !('languages' in raw) ? unwrap(raw, 'skills') : raw;
  const skills: SkillSet = {};

  if (!isRecord(source)) {
    log.warn({ received: typeof source }, 'Skills document is not an object; no skills loaded');
    return skills;
  }

  for (const category of SKILL_CATEGORIES) {
    const value = source[category];
    if (value === undefined) {
      continue;
    }
    if (!isStringList(value)) {
      log.warn({ category }, 'Skill category is not a list of strings; skipped');
      continue;
    }
    skills[category] = value;
  }

  return skills;
}

/**
 * Loads and validates the source corpus
 */
export class CorpusLoader {
  constructor(private readonly storage: StorageProvider) {}

  async load(): Promise<ResumeDocument> {
    const personalInfo = await this.readJson(CORPUS_FILES.personal_info);
    const education = await this.readJson(CORPUS_FILES.education);
    const experience = await this.readJson(CORPUS_FILES.experience);
    const projects = await this.readJson(CORPUS_FILES.projects);
    const skills = await this.readJson(CORPUS_FILES.skills);

    const document: ResumeDocument = {
      personal_info: this.validate(CORPUS_FILES.personal_info, PersonalInfoSchema, personalInfo),
      education: this.validate(CORPUS_FILES.education, z.array(EducationSchema), unwrap(education, 'education')),
      experience: this.validate(CORPUS_FILES.experience, z.array(ExperienceSchema), unwrap(experience, 'experience')),
      projects: this.validate(CORPUS_FILES.projects, z.array(ProjectSchema), unwrap(projects, 'projects')),
      skills: normalizeSkills(skills)
    };

    log.info(
      {
        experiences: document.experience.length,
        projects: document.projects.length,
        education: document.education.length,
        skillCategories: Object.keys(document.skills)
      },
      'Corpus loaded'
    );

    return document;
  }

  private async readJson(fileName: string): Promise<unknown> {
    if (!(await this.storage.exists(fileName))) {
      throw TailorErrorFactory.corpusFileNotFound(this.storage.describe(fileName));
    }

    const content = await this.storage.read(fileName);
    try {
      return JSON.parse(content);
    } catch (error) {
      throw TailorErrorFactory.corpusInvalid(
        this.storage.describe(fileName),
        error instanceof Error ? error.message : String(error)
      );
    }
  }

  private validate<T>(fileName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
    const validation = validateWithSchema(schema, data);
    if (!validation.success) {
      throw TailorErrorFactory.corpusInvalid(
        this.storage.describe(fileName),
        'Schema validation failed',
        validation.result.errors
      );
    }
    return validation.data;
  }
}

/**
 * Read the job description once; its text is used verbatim in every prompt
 */
export async function readJobDescription(filePath: string): Promise<string> {
  const storage = new FileStorage(path.dirname(filePath));
  const fileName = path.basename(filePath);

  if (!(await storage.exists(fileName))) {
    throw TailorErrorFactory.jobDescriptionNotFound(filePath);
  }

  return storage.read(fileName);
}

/**
 * Job name used in artifact file names: the job description's base name without extension
 */
export function jobNameFromPath(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

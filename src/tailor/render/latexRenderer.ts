/**
 * LaTeX Renderer
 *
 * Renders the resume sections and the cover letter with Mustache into a
 * fresh build directory, compiles them, and copies the PDF into place.
 *
 * Template layout (under templateDir):
 *   resume.tex                      entry point, \input{src/<section>}
 *   sections/<section>.tex          heading, experience, projects, skills, education
 *   cover_letter_template.tex       cover letter
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import * as Mustache from 'mustache';
import { loggers } from '../../shared/logging/logger';
import { TailorErrorFactory } from '../errors/types';
import { escapeLatex, prepareDisplayData } from './displayFields';
import { LatexCompiler, ProcessLatexCompiler } from './compiler';
import type { CoverLetterDraft, PersonalInfo, ResumeDocument } from '../types';

const log = loggers.render;

export const RESUME_ENTRY = 'resume.tex';
export const COVER_LETTER_TEMPLATE = 'cover_letter_template.tex';
export const RESUME_SECTIONS = ['heading', 'experience', 'projects', 'skills', 'education'] as const;

export interface LatexRendererOptions {
  templateDir: string;
  compiler?: LatexCompiler;
  /** Parent of the per-render build directories (default: the OS temp dir) */
  buildRoot?: string;
  /** Keep build directories after rendering, for debugging templates */
  keepBuildDir?: boolean;
}

/**
 * Values are escaped before rendering, so Mustache must not HTML-escape them
 */
function renderTemplate(template: string, view: object): string {
  return Mustache.render(template, view, {}, { escape: value => String(value) });
}

function formatLetterDate(date: Date): string {
  return new Intl.DateTimeFormat('en-US', { year: 'numeric', month: 'long', day: 'numeric' }).format(date);
}

export class LatexRenderer {
  private readonly templateDir: string;
  private readonly compiler: LatexCompiler;
  private readonly buildRoot: string;
  private readonly keepBuildDir: boolean;

  constructor(options: LatexRendererOptions) {
    this.templateDir = path.resolve(options.templateDir);
    this.compiler = options.compiler ?? new ProcessLatexCompiler();
    this.buildRoot = options.buildRoot ?? os.tmpdir();
    this.keepBuildDir = options.keepBuildDir ?? false;
  }

  /**
   * Render and compile the resume; resolves to the output path
   */
  async renderResume(document: ResumeDocument, outputPath: string): Promise<string> {
    const data = prepareDisplayData(document);
    const contexts: Record<typeof RESUME_SECTIONS[number], object> = {
      heading: data.personal_info,
      experience: { experience: data.experience },
      projects: { projects: data.projects },
      skills: data.skills,
      education: { education: data.education }
    };

    await this.requireTemplate(RESUME_ENTRY);
    const sectionTemplates = await Promise.all(
      RESUME_SECTIONS.map(section => this.readTemplate(path.join('sections', `${section}.tex`)))
    );

    return this.withBuildDir(async buildDir => {
      await fs.cp(this.templateDir, buildDir, { recursive: true });
      await fs.mkdir(path.join(buildDir, 'src'), { recursive: true });

      for (const [i, section] of RESUME_SECTIONS.entries()) {
        const rendered = renderTemplate(sectionTemplates[i], contexts[section]);
        await fs.writeFile(path.join(buildDir, 'src', `${section}.tex`), rendered, 'utf-8');
      }

      const pdfPath = await this.compiler.compile(RESUME_ENTRY, buildDir);
      return this.publish(pdfPath, outputPath, 'resume');
    });
  }

  /**
   * Render and compile a cover letter; resolves to the output path
   */
  async renderCoverLetter(
    draft: CoverLetterDraft,
    personalInfo: PersonalInfo,
    outputPath: string,
    date: Date = new Date()
  ): Promise<string> {
    const template = await this.readTemplate(COVER_LETTER_TEMPLATE);
    const view = {
      date: formatLetterDate(date),
      name: escapeLatex(personalInfo.name),
      recipient_name: escapeLatex(draft.recipient_name),
      company_name: escapeLatex(draft.company_name),
      intro: escapeLatex(draft.intro),
      body_paragraphs: draft.body_paragraphs.map(escapeLatex),
      closing: escapeLatex(draft.closing)
    };

    return this.withBuildDir(async buildDir => {
      const entry = 'cover_letter.tex';
      await fs.writeFile(path.join(buildDir, entry), renderTemplate(template, view), 'utf-8');

      const pdfPath = await this.compiler.compile(entry, buildDir);
      return this.publish(pdfPath, outputPath, 'cover letter');
    });
  }

  private async requireTemplate(relativePath: string): Promise<string> {
    const templatePath = path.join(this.templateDir, relativePath);
    try {
      await fs.access(templatePath);
    } catch {
      throw TailorErrorFactory.templateNotFound(templatePath);
    }
    return templatePath;
  }

  private async readTemplate(relativePath: string): Promise<string> {
    const templatePath = await this.requireTemplate(relativePath);
    return fs.readFile(templatePath, 'utf-8');
  }

  private async withBuildDir<T>(work: (buildDir: string) => Promise<T>): Promise<T> {
    await fs.mkdir(this.buildRoot, { recursive: true });
    const buildDir = await fs.mkdtemp(path.join(this.buildRoot, 'resume-tailor-'));
    log.debug({ buildDir }, 'Build directory created');

    try {
      return await work(buildDir);
    } finally {
      if (!this.keepBuildDir) {
        await fs.rm(buildDir, { recursive: true, force: true });
      }
    }
  }

  private async publish(pdfPath: string, outputPath: string, label: string): Promise<string> {
    try {
      await fs.access(pdfPath);
    } catch {
      throw TailorErrorFactory.renderFailed(label, `Compiler reported success but produced no PDF at ${pdfPath}`);
    }

    const target = path.resolve(outputPath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.copyFile(pdfPath, target);
    log.info({ output: target }, `Rendered ${label}`);
    return target;
  }
}

/**
 * Tests for the pipeline orchestrator
 */

import { describe, it, expect, vi } from 'vitest';
import * as path from 'path';
import { runPipeline, DocumentRenderer, PipelineOptions } from '../../tailor/pipeline/orchestrator';
import { ArtifactStore, artifactFileName } from '../../tailor/pipeline/artifacts';
import { buildFallbackDraft } from '../../tailor/coverLetter/synthesizer';
import { MemoryStorage } from '../../shared/storage/memoryStorage';
import { ErrorCategory, ErrorLogger } from '../../shared/errors';
import { TailorErrorCode, TailorErrorFactory } from '../../tailor/errors/types';
import type { CoverLetterDraft, PersonalInfo, ResumeDocument } from '../../tailor/types';
import { ScriptedService, experience, resumeDocument } from './helpers';

const TIMESTAMP = '20240109_070503';

class FakeRenderer implements DocumentRenderer {
  readonly resumes: Array<{ document: ResumeDocument; outputPath: string }> = [];
  readonly letters: Array<{ draft: CoverLetterDraft; personalInfo: PersonalInfo; outputPath: string }> = [];

  constructor(private readonly failResume = false) {}

  async renderResume(document: ResumeDocument, outputPath: string): Promise<string> {
    if (this.failResume) {
      throw TailorErrorFactory.renderFailed('resume', 'pdflatex: not found');
    }
    this.resumes.push({ document, outputPath });
    return outputPath;
  }

  async renderCoverLetter(draft: CoverLetterDraft, personalInfo: PersonalInfo, outputPath: string): Promise<string> {
    this.letters.push({ draft, personalInfo, outputPath });
    return outputPath;
  }
}

function setup(options: { storage?: MemoryStorage; renderer?: FakeRenderer; document?: ResumeDocument } = {}) {
  const storage = options.storage ?? new MemoryStorage();
  const renderer = options.renderer ?? new FakeRenderer();
  const document = options.document ?? resumeDocument();
  const corpus = { load: vi.fn(async () => document) };

  return {
    storage,
    renderer,
    corpus,
    deps: {
      corpus,
      artifacts: new ArtifactStore(storage),
      renderer,
      sleep: async () => undefined,
      readJobDescription: async () => 'Backend engineer: TypeScript, PostgreSQL, Kafka.'
    }
  };
}

function pipelineOptions(overrides: Partial<PipelineOptions> = {}): PipelineOptions {
  return {
    jobDescriptionPath: 'job-applications/backend.txt',
    stages: [1, 2, 3, 4],
    budgets: { maxExperiences: 1, maxProjects: 2, maxSkillsPerCategory: 3 },
    concise: false,
    finalDir: 'output',
    companyName: 'Initech',
    now: new Date(2024, 0, 9, 7, 5, 3),
    ...overrides
  };
}

describe('runPipeline', () => {
  it('should run every stage in dry-run and chain outputs in memory', async () => {
    const { storage, renderer, corpus, deps } = setup();

    const result = await runPipeline(pipelineOptions(), deps);

    expect(result).toMatchObject({ status: 'success', completed: [1, 2, 3, 4] });
    expect(corpus.load).toHaveBeenCalledTimes(1);
    expect(Object.keys(storage.dump()).sort()).toEqual([
      `backend_step1_filtered_${TIMESTAMP}.json`,
      `backend_step2_optimized_${TIMESTAMP}.json`
    ]);

    expect(renderer.resumes).toHaveLength(1);
    expect(renderer.resumes[0].outputPath).toBe(path.join('output', `backend_resume_${TIMESTAMP}.pdf`));
    expect(renderer.resumes[0].document.experience.map(e => e.company)).toEqual(['Acme']);
    expect(renderer.resumes[0].document.skills.technologies).toEqual(['PostgreSQL', 'Redis', 'Kafka']);

    expect(renderer.letters[0].outputPath).toBe(path.join('output', `backend_cover_letter_${TIMESTAMP}.pdf`));
    expect(renderer.letters[0].draft).toEqual(buildFallbackDraft(renderer.resumes[0].document, 'Initech'));
    expect(renderer.letters[0].personalInfo.name).toBe('Test Candidate');
    expect(result.outputs.coverLetterDraft?.company_name).toBe('Initech');
  });

  it('should resume from the latest artifact when the producing stage is not requested', async () => {
    const filtered = resumeDocument({
      experience: [experience('Archived Co', { bullets: ['Kept the lights on'] })],
      projects: []
    });
    const storage = new MemoryStorage({
      [artifactFileName('backend', 'step1_filtered', '20240101_000000')]: JSON.stringify(resumeDocument()),
      [artifactFileName('backend', 'step1_filtered', '20240105_000000')]: JSON.stringify(filtered)
    });
    const { renderer, corpus, deps } = setup({ storage });
    const service = new ScriptedService('• Kept production TypeScript services running');

    const result = await runPipeline(pipelineOptions({ stages: [2, 3] }), { ...deps, service });

    expect(result).toMatchObject({ status: 'success', completed: [2, 3] });
    expect(corpus.load).not.toHaveBeenCalled();
    expect(service.calls).toBe(1);
    expect(service.prompt()).toContain('CONTEXT: Experience at Archived Co as Engineer');
    expect(renderer.resumes[0].document.experience[0].bullets).toEqual(['Kept production TypeScript services running']);
  });

  it('should fail the stage whose artifact is missing', async () => {
    const { renderer, deps } = setup();

    const result = await runPipeline(pipelineOptions({ stages: [3] }), deps);

    expect(result.status).toBe('failed');
    if (result.status === 'failed') {
      expect(result.stage).toBe(3);
      expect(result.completed).toEqual([]);
      expect(result.error).toMatchObject({ code: TailorErrorCode.ARTIFACT_NOT_FOUND });
    }
    expect(renderer.resumes).toHaveLength(0);
  });

  it('should halt at the first failing stage', async () => {
    const { renderer, storage, deps } = setup({ renderer: new FakeRenderer(true) });

    const result = await runPipeline(pipelineOptions(), deps);

    expect(result).toMatchObject({ status: 'failed', stage: 3, completed: [1, 2] });
    expect(result.outputs.optimizedArtifact).toBe(`backend_step2_optimized_${TIMESTAMP}.json`);
    expect(Object.keys(storage.dump())).toHaveLength(2);
    expect(renderer.letters).toHaveLength(0);
  });

  it('should record the stage failure in the error history', async () => {
    ErrorLogger.clearLogs();
    const { deps } = setup({ renderer: new FakeRenderer(true) });

    await runPipeline(pipelineOptions({ stages: [1, 2, 3] }), deps);

    expect(ErrorLogger.getLogsByCategory(ErrorCategory.RENDERING)).toEqual([
      expect.objectContaining({
        userMessage: 'Failed to compile resume',
        technicalDetails: 'pdflatex: not found',
        context: { document: 'resume', stage: 3, stageName: 'Resume rendering' }
      })
    ]);
  });

  it('should attribute an unreadable job description to the first stage', async () => {
    const { deps } = setup();
    const readJobDescription = async (filePath: string): Promise<string> => {
      throw TailorErrorFactory.jobDescriptionNotFound(filePath);
    };

    const result = await runPipeline(pipelineOptions({ stages: [2, 3] }), { ...deps, readJobDescription });

    expect(result).toMatchObject({ status: 'failed', stage: 2, completed: [] });
    if (result.status === 'failed') {
      expect(result.error).toMatchObject({ code: TailorErrorCode.JOB_DESCRIPTION_NOT_FOUND });
    }
  });

  it('should use explicit output paths', async () => {
    const { renderer, deps } = setup();

    await runPipeline(
      pipelineOptions({ resumeOutputPath: 'custom/me.pdf', coverLetterOutputPath: 'custom/letter.pdf' }),
      deps
    );

    expect(renderer.resumes[0].outputPath).toBe('custom/me.pdf');
    expect(renderer.letters[0].outputPath).toBe('custom/letter.pdf');
  });

  it('should do nothing for an empty stage list', async () => {
    const { corpus, deps } = setup();

    const result = await runPipeline(pipelineOptions({ stages: [] }), deps);

    expect(result).toEqual({ status: 'success', completed: [], outputs: {} });
    expect(corpus.load).not.toHaveBeenCalled();
  });
});

/**
 * Pipeline Orchestrator
 *
 * Runs the requested stages in order:
 *
 * ```
 * Corpus → [1 Filter] → step1 artifact → [2 Optimize] → step2 artifact → [3 Render] → resume PDF
 *                                                                      ↘ [4 Cover letter] → cover letter PDF
 * ```
 *
 * Each stage reads its predecessor's in-memory output when the predecessor
 * ran in this invocation, else the latest artifact on disk. The first
 * failing stage halts the run; nothing after it is attempted.
 *
 * Usage:
 * ```typescript
 * const result = await runPipeline(
 *   { jobDescriptionPath: 'job-applications/backend.txt', stages: [2, 3], budgets, concise: false, finalDir: 'output' },
 *   { corpus, artifacts, renderer, service }
 * );
 * ```
 */

import * as path from 'path';
import { loggers, serializeError } from '../../shared/logging/logger';
import { ErrorHandler } from '../../shared/errors/handler';
import type { TextGenerationService } from '../../shared/llm/types';
import { readJobDescription, jobNameFromPath } from '../corpus/loader';
import { filterResume } from '../selector/filterResume';
import { optimizeResume } from '../optimizer/resumeOptimizer';
import { synthesizeCoverLetter } from '../coverLetter/synthesizer';
import { DEFAULT_CONFIG } from '../config';
import { ArtifactStore, formatTimestamp } from './artifacts';
import { planStages, PlannedStage, StageNumber, STAGES } from './stages';
import type {
  CoverLetterDraft,
  PersonalInfo,
  RequestDelays,
  ResumeDocument,
  SlotBudgets,
  TailorContext
} from '../types';

const log = loggers.pipeline;

// ============================================================================
// Types
// ============================================================================

export interface PipelineOptions {
  jobDescriptionPath: string;
  stages: StageNumber[];
  budgets: SlotBudgets;
  concise: boolean;
  /** Directory for final PDFs */
  finalDir: string;
  /** Explicit resume PDF path (overrides finalDir naming) */
  resumeOutputPath?: string;
  /** Explicit cover letter PDF path (overrides finalDir naming) */
  coverLetterOutputPath?: string;
  companyName?: string;
  /** Invocation time; names every file this run writes */
  now?: Date;
}

/**
 * Source of the loaded corpus for stage 1
 */
export interface CorpusSource {
  load(): Promise<ResumeDocument>;
}

/**
 * Compiles final documents
 */
export interface DocumentRenderer {
  renderResume(document: ResumeDocument, outputPath: string): Promise<string>;
  renderCoverLetter(draft: CoverLetterDraft, personalInfo: PersonalInfo, outputPath: string): Promise<string>;
}

export interface PipelineDependencies {
  corpus: CorpusSource;
  artifacts: ArtifactStore;
  renderer: DocumentRenderer;
  /** Absent in dry-run: every component takes its deterministic path */
  service?: TextGenerationService;
  delays?: RequestDelays;
  sleep?: (ms: number) => Promise<void>;
  readJobDescription?: (filePath: string) => Promise<string>;
}

export interface PipelineOutputs {
  filteredArtifact?: string;
  optimizedArtifact?: string;
  resumePdf?: string;
  coverLetterPdf?: string;
  coverLetterDraft?: CoverLetterDraft;
}

export type PipelineResult =
  | { status: 'success'; completed: StageNumber[]; outputs: PipelineOutputs }
  | { status: 'failed'; stage: StageNumber; error: Error; completed: StageNumber[]; outputs: PipelineOutputs };

// ============================================================================
// Orchestrator
// ============================================================================

const defaultSleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

export async function runPipeline(
  options: PipelineOptions,
  deps: PipelineDependencies
): Promise<PipelineResult> {
  const plan = planStages(options.stages);
  const completed: StageNumber[] = [];
  const outputs: PipelineOutputs = {};

  if (plan.length === 0) {
    return { status: 'success', completed, outputs };
  }

  const jobName = jobNameFromPath(options.jobDescriptionPath);
  const timestamp = formatTimestamp(options.now ?? new Date());

  log.info(
    {
      job: jobName,
      stages: plan.map(({ stage, input }) => `${stage}<-${input.kind}`),
      dryRun: !deps.service
    },
    'Pipeline start'
  );

  let jobDescription: string;
  try {
    jobDescription = await (deps.readJobDescription ?? readJobDescription)(options.jobDescriptionPath);
  } catch (error) {
    return fail(plan[0].stage, error, completed, outputs);
  }

  const context: TailorContext = {
    jobDescription,
    service: deps.service,
    delays: deps.delays ?? DEFAULT_CONFIG.delays,
    sleep: deps.sleep ?? defaultSleep
  };

  const produced = new Map<StageNumber, ResumeDocument>();

  // Resolve a stage's input document from memory or the latest artifact
  const resolveInput = async (planned: PlannedStage): Promise<ResumeDocument> => {
    const { input } = planned;
    switch (input.kind) {
      case 'corpus':
        return deps.corpus.load();
      case 'memory': {
        const document = produced.get(input.from);
        if (!document) {
          throw new Error(`Stage ${input.from} output is missing from memory`);
        }
        return document;
      }
      case 'artifact':
        return (await deps.artifacts.readLatest(jobName, input.label)).document;
    }
  };

  for (const planned of plan) {
    const { stage } = planned;
    const definition = STAGES[stage];
    const started = Date.now();
    log.info({ stage, name: definition.name, input: planned.input.kind }, '▶ Stage start');

    try {
      const input = await resolveInput(planned);

      switch (stage) {
        case 1: {
          const filtered = await filterResume(input, options.budgets, context);
          outputs.filteredArtifact = await deps.artifacts.write(jobName, 'step1_filtered', timestamp, filtered);
          produced.set(1, filtered);
          break;
        }
        case 2: {
          const optimized = await optimizeResume(input, { concise: options.concise }, context);
          outputs.optimizedArtifact = await deps.artifacts.write(jobName, 'step2_optimized', timestamp, optimized);
          produced.set(2, optimized);
          break;
        }
        case 3: {
          const target = options.resumeOutputPath
            ?? path.join(options.finalDir, `${jobName}_resume_${timestamp}.pdf`);
          outputs.resumePdf = await deps.renderer.renderResume(input, target);
          break;
        }
        case 4: {
          const draft = await synthesizeCoverLetter(input, { companyName: options.companyName }, context);
          outputs.coverLetterDraft = draft;
          const target = options.coverLetterOutputPath
            ?? path.join(options.finalDir, `${jobName}_cover_letter_${timestamp}.pdf`);
          outputs.coverLetterPdf = await deps.renderer.renderCoverLetter(draft, input.personal_info, target);
          break;
        }
      }
    } catch (error) {
      return fail(stage, error, completed, outputs);
    }

    completed.push(stage);
    log.info({ stage, name: definition.name, elapsedMs: Date.now() - started }, '✔ Stage complete');
  }

  log.info({ job: jobName, completed }, 'Pipeline complete');
  return { status: 'success', completed, outputs };
}

function fail(
  stage: StageNumber,
  error: unknown,
  completed: StageNumber[],
  outputs: PipelineOutputs
): PipelineResult {
  const err = error instanceof Error ? error : new Error(String(error));
  ErrorHandler.logError(err, { stage, stageName: STAGES[stage].name }, log);
  log.error({ stage, name: STAGES[stage].name, err: serializeError(err) }, '✖ Stage failed; halting pipeline');
  return { status: 'failed', stage, error: err, completed, outputs };
}

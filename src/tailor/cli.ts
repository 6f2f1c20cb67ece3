#!/usr/bin/env node
/**
 * resume-tailor CLI
 *
 * Usage: resume-tailor <job-description.txt> [options]
 */

import { parseArgs } from 'util';
import { ErrorHandler } from '../shared/errors/handler';
import { AppError } from '../shared/errors/types';
import { FileStorage } from '../shared/storage/fileStorage';
import { ConfigManager, ConfigOverrides, createLLMClientFromEnv } from './config';
import { CorpusLoader } from './corpus/loader';
import { TailorErrorFactory } from './errors/types';
import { ArtifactStore } from './pipeline/artifacts';
import { runPipeline } from './pipeline/orchestrator';
import { parseStageSelection } from './pipeline/stages';
import { LatexRenderer } from './render/latexRenderer';

const HELP = `Usage: resume-tailor <job-description> [options]

Select, optimize and render resume content for a job description.

Stages:
  1  Relevance filtering     (writes {job}_step1_filtered_{timestamp}.json)
  2  Bullet optimization     (writes {job}_step2_optimized_{timestamp}.json)
  3  Resume PDF rendering
  4  Cover letter generation

Options:
  --step <sel>                     1-4, a range such as 2-3, or all (default: all)
  --source-dir <dir>               Source JSON directory (default: about-me)
  --output-dir <dir>               Intermediate artifact directory (default: intermediate-outputs)
  --final-output <file>            Resume PDF path (default: output/{job}_resume_{timestamp}.pdf)
  --max-experiences <n>            Experiences to keep (default: 3)
  --max-projects <n>               Projects to keep (default: 2)
  --max-skills-per-category <n>    Skills to keep per category (default: 8)
  --concise                        Shorter bullets (80 instead of 120 characters)
  --dry-run                        Skip every text-generation call
  --generate-cover-letter          Include stage 4 in "all"
  --company-name <name>            Company name for the cover letter
  --provider <openai|anthropic>    Text-generation provider (default: openai)
  --model <model>                  Model override
  --api-key <key>                  API key (or OPENAI_API_KEY / ANTHROPIC_API_KEY)
  -h, --help                       Show this help

Examples:
  resume-tailor job-applications/backend.txt
  resume-tailor job-applications/backend.txt --step 2-3 --concise
  resume-tailor job-applications/backend.txt --generate-cover-letter --company-name "Acme"`;

function parseCount(value: string | undefined, field: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw TailorErrorFactory.configurationError(field, `Expected a non-negative integer (got "${value}")`);
  }
  return parsed;
}

function printError(error: unknown): void {
  console.error(`\n✖ ${ErrorHandler.formatUserMessage(error)}`);
  if (!(error instanceof AppError) && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
}

function parseCommandLine(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      step: { type: 'string', default: 'all' },
      'source-dir': { type: 'string' },
      'output-dir': { type: 'string' },
      'final-output': { type: 'string' },
      'max-experiences': { type: 'string' },
      'max-projects': { type: 'string' },
      'max-skills-per-category': { type: 'string' },
      concise: { type: 'boolean', default: false },
      'dry-run': { type: 'boolean', default: false },
      'generate-cover-letter': { type: 'boolean', default: false },
      'company-name': { type: 'string' },
      provider: { type: 'string' },
      model: { type: 'string' },
      'api-key': { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false }
    }
  });
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(HELP);
    return 1;
  }

  const { values, positionals } = parsed;

  if (values.help) {
    console.log(HELP);
    return 0;
  }

  const jobDescriptionPath = positionals[0];
  if (!jobDescriptionPath) {
    console.error('Missing job description path.\n');
    console.error(HELP);
    return 1;
  }

  try {
    const overrides: ConfigOverrides = {
      maxExperiences: parseCount(values['max-experiences'], 'max-experiences'),
      maxProjects: parseCount(values['max-projects'], 'max-projects'),
      maxSkillsPerCategory: parseCount(values['max-skills-per-category'], 'max-skills-per-category'),
      provider: values.provider,
      model: values.model,
      apiKey: values['api-key'],
      sourceDir: values['source-dir'],
      outputDir: values['output-dir']
    };
    const manager = new ConfigManager(overrides);
    const config = manager.getConfig();

    const stages = parseStageSelection(values.step ?? 'all', values['generate-cover-letter'] ?? false);
    const dryRun = values['dry-run'] ?? false;
    // Only stages 1, 2 and 4 call the service; stage 3 alone needs no key
    const needsService = !dryRun && stages.some(stage => stage !== 3);
    const service = needsService ? createLLMClientFromEnv(manager) : undefined;

    console.log('🚀 Starting resume pipeline');
    console.log(`Job description: ${jobDescriptionPath}`);
    console.log(`Stages: ${stages.join(', ')}${dryRun ? ' (dry run)' : ''}`);
    if (service) {
      const { provider, model } = service.getConfig();
      console.log(`Model: ${provider}/${model}`);
    }

    const result = await runPipeline(
      {
        jobDescriptionPath,
        stages,
        budgets: config.budgets,
        concise: values.concise ?? false,
        finalDir: config.paths.finalDir,
        resumeOutputPath: values['final-output'],
        companyName: values['company-name']
      },
      {
        corpus: new CorpusLoader(new FileStorage(config.paths.sourceDir)),
        artifacts: new ArtifactStore(new FileStorage(config.paths.outputDir)),
        renderer: new LatexRenderer({ templateDir: config.paths.templateDir }),
        service,
        delays: config.delays
      }
    );

    if (result.status === 'failed') {
      // runPipeline has already recorded the failure
      console.error(`\n❌ Stage ${result.stage} failed`);
      printError(result.error);
      return 1;
    }

    const { outputs } = result;
    console.log('\n🎉 Pipeline completed successfully!');
    if (outputs.filteredArtifact) console.log(`📋 Filtered resume: ${config.paths.outputDir}/${outputs.filteredArtifact}`);
    if (outputs.optimizedArtifact) console.log(`✨ Optimized resume: ${config.paths.outputDir}/${outputs.optimizedArtifact}`);
    if (outputs.resumePdf) console.log(`📄 Final resume: ${outputs.resumePdf}`);
    if (outputs.coverLetterPdf) console.log(`📝 Cover letter: ${outputs.coverLetterPdf}`);
    return 0;
  } catch (error) {
    ErrorHandler.logError(error);
    printError(error);
    return 1;
  }
}

if (require.main === module) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      ErrorHandler.logError(error);
      printError(error);
      process.exitCode = 1;
    });
}

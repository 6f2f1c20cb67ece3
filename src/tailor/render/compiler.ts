/**
 * LaTeX Compiler
 *
 * Runs latexmk, falling back to two pdflatex passes when latexmk is missing
 * or fails. Output of every run is captured for the error report.
 */

import { spawn } from 'child_process';
import * as path from 'path';
import { loggers } from '../../shared/logging/logger';
import { TailorErrorFactory } from '../errors/types';

const log = loggers.render;

/**
 * Compiles a .tex file in its working directory and returns the PDF path
 */
export interface LatexCompiler {
  compile(entryFile: string, workingDir: string): Promise<string>;
}

interface RunResult {
  code: number | null;
  output: string;
}

function run(command: string, args: string[], cwd: string): Promise<RunResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd });
    let output = '';

    child.stdout.on('data', (chunk: Buffer) => {
      output += chunk.toString();
    });
    child.stderr.on('data', (chunk: Buffer) => {
      output += chunk.toString();
    });
    child.on('error', reject);
    child.on('close', code => resolve({ code, output }));
  });
}

function describeFailure(command: string, error: unknown): string {
  return `${command}: ${error instanceof Error ? error.message : String(error)}`;
}

export class ProcessLatexCompiler implements LatexCompiler {
  async compile(entryFile: string, workingDir: string): Promise<string> {
    const pdfPath = path.join(workingDir, `${path.basename(entryFile, '.tex')}.pdf`);
    const transcript: string[] = [];

    try {
      const result = await run('latexmk', ['-pdf', '-interaction=nonstopmode', entryFile], workingDir);
      if (result.code === 0) {
        return pdfPath;
      }
      transcript.push(result.output);
    } catch (error) {
      transcript.push(describeFailure('latexmk', error));
    }

    log.debug({ entryFile }, 'latexmk unavailable or failed; running pdflatex');

    // Two passes so references resolve
    for (let pass = 1; pass <= 2; pass++) {
      let result: RunResult;
      try {
        result = await run('pdflatex', ['-interaction=nonstopmode', entryFile], workingDir);
      } catch (error) {
        transcript.push(describeFailure('pdflatex', error));
        throw TailorErrorFactory.renderFailed(entryFile, transcript.join('\n'));
      }
      if (result.code !== 0) {
        transcript.push(result.output);
        throw TailorErrorFactory.renderFailed(entryFile, transcript.join('\n'));
      }
    }

    return pdfPath;
  }
}

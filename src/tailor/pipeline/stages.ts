/**
 * Pipeline Stages
 *
 *   1 Filter -> 2 Optimize -> 3 Render
 *                         \-> 4 Cover letter
 *
 * Planning is pure: which stages run decides where each one reads its input.
 */

import { TailorErrorFactory } from '../errors/types';
import type { ArtifactLabel } from './artifacts';

export type StageNumber = 1 | 2 | 3 | 4;

export const STAGE_NUMBERS: readonly StageNumber[] = [1, 2, 3, 4];

export interface StageDefinition {
  name: string;
  /** Stage whose output this stage consumes */
  dependsOn?: StageNumber;
  /** Artifact label this stage writes */
  produces?: ArtifactLabel;
}

export const STAGES: Record<StageNumber, StageDefinition> = {
  1: { name: 'Relevance filtering', produces: 'step1_filtered' },
  2: { name: 'Bullet optimization', dependsOn: 1, produces: 'step2_optimized' },
  3: { name: 'Resume rendering', dependsOn: 2 },
  4: { name: 'Cover letter generation', dependsOn: 2 }
};

export type StageInput =
  | { kind: 'corpus' }
  | { kind: 'memory'; from: StageNumber }
  | { kind: 'artifact'; label: ArtifactLabel };

export interface PlannedStage {
  stage: StageNumber;
  input: StageInput;
}

function isStageNumber(value: number): value is StageNumber {
  return STAGE_NUMBERS.some(stage => stage === value);
}

/**
 * Parse a stage selection: "1".."4", an inclusive range "a-b", or "all"
 * ("all" runs 1-3, plus 4 when cover letters are requested)
 */
export function parseStageSelection(value: string, generateCoverLetter = false): StageNumber[] {
  const selection = value.trim().toLowerCase();

  if (selection === 'all') {
    return generateCoverLetter ? [1, 2, 3, 4] : [1, 2, 3];
  }

  const match = /^(\d+)(?:-(\d+))?$/.exec(selection);
  if (!match) {
    throw TailorErrorFactory.invalidStageRange(value, 'Expected a stage number, a range such as 2-3, or "all"');
  }

  const start = Number(match[1]);
  const end = match[2] === undefined ? start : Number(match[2]);

  if (!isStageNumber(start) || !isStageNumber(end)) {
    throw TailorErrorFactory.invalidStageRange(value, 'Stages are numbered 1 to 4');
  }
  if (start > end) {
    throw TailorErrorFactory.invalidStageRange(value, `Range start ${start} is after its end ${end}`);
  }

  return STAGE_NUMBERS.filter(stage => stage >= start && stage <= end);
}

/**
 * Decide each requested stage's input source
 */
export function planStages(requested: readonly StageNumber[]): PlannedStage[] {
  const stages = STAGE_NUMBERS.filter(stage => requested.includes(stage));

  return stages.map((stage): PlannedStage => {
    const { dependsOn } = STAGES[stage];
    if (dependsOn === undefined) {
      return { stage, input: { kind: 'corpus' } };
    }
    if (stages.includes(dependsOn)) {
      return { stage, input: { kind: 'memory', from: dependsOn } };
    }
    const label = STAGES[dependsOn].produces;
    if (!label) {
      throw new Error(`Stage ${dependsOn} produces no artifact`);
    }
    return { stage, input: { kind: 'artifact', label } };
  });
}

/**
 * Stage Artifacts
 *
 * Each stage's output is a JSON file named {job}_{label}_{timestamp}.json.
 * Artifacts are append-only: an existing file is never rewritten, and the
 * "latest" artifact is the lexicographically last matching name.
 */

import type { StorageProvider } from '../../shared/storage/interface';
import { validateWithSchema } from '../../shared/validation/validator';
import { loggers } from '../../shared/logging/logger';
import { TailorErrorFactory } from '../errors/types';
import { ResumeDocumentSchema } from '../validation/schemas';
import type { ResumeDocument } from '../types';

const log = loggers.pipeline;

export const ARTIFACT_LABELS = ['step1_filtered', 'step2_optimized'] as const;
export type ArtifactLabel = typeof ARTIFACT_LABELS[number];

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * YYYYMMDD_HHMMSS in local time; sorts chronologically as a string
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

const SUFFIX_WIDTH = 3;

export function artifactFileName(jobName: string, label: ArtifactLabel, timestamp: string): string {
  return `${jobName}_${label}_${timestamp}.json`;
}

export interface StoredArtifact {
  name: string;
  document: ResumeDocument;
}

export class ArtifactStore {
  constructor(private readonly storage: StorageProvider) {}

  /**
   * Write a new artifact. A name already taken (same job, label and second)
   * gets a zero-padded suffix, so names keep sorting in write order.
   */
  async write(jobName: string, label: ArtifactLabel, timestamp: string, document: ResumeDocument): Promise<string> {
    let name = artifactFileName(jobName, label, timestamp);
    for (let suffix = 1; await this.storage.exists(name); suffix++) {
      name = artifactFileName(jobName, label, `${timestamp}_${pad(suffix, SUFFIX_WIDTH)}`);
    }

    await this.storage.write(name, JSON.stringify(document, null, 2));
    log.info({ artifact: this.storage.describe(name) }, 'Artifact written');
    return name;
  }

  /**
   * Name of the most recent artifact for a job and label, if any
   */
  async findLatest(jobName: string, label: ArtifactLabel): Promise<string | undefined> {
    const prefix = `${jobName}_${label}_`;
    const matches = (await this.storage.list(''))
      .filter(name => name.startsWith(prefix) && name.endsWith('.json'))
      .sort();

    return matches[matches.length - 1];
  }

  /**
   * Read and validate the most recent artifact
   *
   * @throws TailorError ARTIFACT_NOT_FOUND or ARTIFACT_INVALID
   */
  async readLatest(jobName: string, label: ArtifactLabel): Promise<StoredArtifact> {
    const name = await this.findLatest(jobName, label);
    if (!name) {
      throw TailorErrorFactory.artifactNotFound(label, this.storage.describe(''), jobName);
    }

    const content = await this.storage.read(name);
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw TailorErrorFactory.artifactInvalid(
        this.storage.describe(name),
        error instanceof Error ? error.message : String(error)
      );
    }

    const validation = validateWithSchema(ResumeDocumentSchema, parsed);
    if (!validation.success) {
      throw TailorErrorFactory.artifactInvalid(
        this.storage.describe(name),
        'Schema validation failed',
        validation.result.errors
      );
    }

    log.info({ artifact: this.storage.describe(name) }, 'Using existing artifact');
    return { name, document: validation.data };
  }
}

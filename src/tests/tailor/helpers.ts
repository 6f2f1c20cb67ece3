/**
 * Test helpers: a scripted text-generation service and document builders
 */

import type { LLMRequest, LLMResponse, TextGenerationService } from '../../shared/llm/types';
import type { Experience, Project, ResumeDocument, TailorContext } from '../../tailor/types';

type ScriptedReply = string | Error;

/**
 * Replays one scripted reply per call, in order, and records every request.
 * Calls beyond the script fail, which exercises the fallback paths.
 */
export class ScriptedService implements TextGenerationService {
  readonly requests: LLMRequest[] = [];
  private readonly replies: ScriptedReply[];

  constructor(...replies: ScriptedReply[]) {
    this.replies = replies;
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    this.requests.push(request);
    const reply = this.replies.shift();

    if (reply === undefined) {
      throw new Error('No scripted reply left');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return { content: reply, model: 'test-model' };
  }

  get calls(): number {
    return this.requests.length;
  }

  /** User prompt of the nth call */
  prompt(index = 0): string {
    return this.requests[index]?.messages[0]?.content ?? '';
  }
}

export function makeContext(service?: TextGenerationService, overrides: Partial<TailorContext> = {}): TailorContext {
  return {
    jobDescription: 'Backend engineer: TypeScript, PostgreSQL, Kafka.',
    service,
    delays: { skillsMs: 0, optimizerMs: 0 },
    sleep: async () => undefined,
    ...overrides
  };
}

export function experience(company: string, overrides: Partial<Experience> = {}): Experience {
  return {
    company,
    role: 'Engineer',
    start_date: '2020',
    end_date: '2022',
    bullets: [`Shipped features at ${company}`],
    ...overrides
  };
}

export function project(name: string, overrides: Partial<Project> = {}): Project {
  return {
    name,
    tech: ['TypeScript'],
    bullets: [`Built ${name}`],
    ...overrides
  };
}

export function resumeDocument(overrides: Partial<ResumeDocument> = {}): ResumeDocument {
  return {
    personal_info: { name: 'Test Candidate', email: 'candidate@example.com' },
    education: [
      { institution: 'Test University', degree: 'B.S. Computer Science', relevant_coursework: ['Algorithms', 'Databases'] }
    ],
    experience: [
      experience('Acme', { role: 'Backend Engineer', bullets: ['Built APIs', 'Ran on-call'] }),
      experience('Globex', { role: 'Developer', bullets: ['Wrote tests'] })
    ],
    projects: [project('Tracker', { bullets: ['Tracks parcels', 'Sends alerts'] })],
    skills: {
      languages: ['TypeScript', 'Go'],
      technologies: ['PostgreSQL', 'Redis', 'Kafka', 'Docker'],
      concepts: ['Testing']
    },
    ...overrides
  };
}

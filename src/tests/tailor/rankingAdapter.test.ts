/**
 * Tests for the external ranking adapter
 */

import { describe, it, expect } from 'vitest';
import { rankPool, resolveRankedItems } from '../../tailor/selector/rankingAdapter';
import { PROJECT_DESCRIPTOR } from '../../tailor/selector/prompts';
import { ScriptedService, makeContext, project } from './helpers';

const pool = ['a', 'b', 'c', 'd', 'e'];

describe('resolveRankedItems', () => {
  it('should map 1-based indices in reply order', () => {
    expect(resolveRankedItems([3, 1], pool, 2)).toEqual(['c', 'a']);
  });

  it('should drop out-of-range and non-integer entries', () => {
    expect(resolveRankedItems([0, 6, -1, 2.5, '2', null, 4], pool, 2)).toEqual(['d', 'a']);
  });

  it('should count repeated indices once', () => {
    expect(resolveRankedItems([2, 2, 2], pool, 3)).toEqual(['b', 'a', 'c']);
  });

  it('should pad short replies in pool order', () => {
    expect(resolveRankedItems([5], pool, 3)).toEqual(['e', 'a', 'b']);
    expect(resolveRankedItems([], pool, 2)).toEqual(['a', 'b']);
  });

  it('should truncate long replies to the slot count', () => {
    expect(resolveRankedItems([5, 4, 3, 2, 1], pool, 2)).toEqual(['e', 'd']);
  });
});

describe('rankPool', () => {
  const projects = [
    project('Ledger', { tech: ['Go', 'PostgreSQL'], priority: 'medium' }),
    project('Chat'),
    project('Blog', { priority: 'low' })
  ];

  it('should return nothing when there are no slots', async () => {
    const service = new ScriptedService('[1]');

    expect(await rankPool(projects, 0, PROJECT_DESCRIPTOR, makeContext(service))).toEqual([]);
    expect(service.calls).toBe(0);
  });

  it('should keep pool order in dry-run', async () => {
    const ranked = await rankPool(projects, 2, PROJECT_DESCRIPTOR, makeContext());

    expect(ranked.map(p => p.name)).toEqual(['Ledger', 'Chat']);
  });

  it('should accept a fenced JSON reply', async () => {
    const service = new ScriptedService('```json\n[3, 1]\n```');

    const ranked = await rankPool(projects, 2, PROJECT_DESCRIPTOR, makeContext(service));

    expect(ranked.map(p => p.name)).toEqual(['Blog', 'Ledger']);
  });

  it('should fall back when the reply wraps the list in prose', async () => {
    const service = new ScriptedService('Here is my ranking: [2] - hope it helps');

    const ranked = await rankPool(projects, 1, PROJECT_DESCRIPTOR, makeContext(service));

    expect(ranked.map(p => p.name)).toEqual(['Ledger']);
  });

  it('should fall back when the reply is cut off', async () => {
    const service = new ScriptedService('[3, 2');

    const ranked = await rankPool(projects, 2, PROJECT_DESCRIPTOR, makeContext(service));

    expect(ranked.map(p => p.name)).toEqual(['Ledger', 'Chat']);
  });

  it('should fall back when the reply is an object instead of a list', async () => {
    const service = new ScriptedService('{"selected": [3]}');

    const ranked = await rankPool(projects, 2, PROJECT_DESCRIPTOR, makeContext(service));

    expect(ranked.map(p => p.name)).toEqual(['Ledger', 'Chat']);
  });

  it('should fall back when the service throws', async () => {
    const service = new ScriptedService(new Error('429 Too Many Requests'));

    const ranked = await rankPool(projects, 1, PROJECT_DESCRIPTOR, makeContext(service));

    expect(ranked.map(p => p.name)).toEqual(['Ledger']);
  });

  it('should describe every candidate with its priority', async () => {
    const service = new ScriptedService('[1, 2]');

    await rankPool(projects, 2, PROJECT_DESCRIPTOR, makeContext(service));

    const prompt = service.prompt();
    expect(prompt).toContain(
      'Project 1:\nName: Ledger\nTechnologies: Go, PostgreSQL [Priority: medium]\nDescription:\n• Built Ledger'
    );
    expect(prompt).toContain('Technologies: TypeScript [Priority: unset]');
    expect(prompt).toContain('JOB DESCRIPTION:\nBackend engineer: TypeScript, PostgreSQL, Kafka.');
    expect(prompt).toContain('Select the 2 most relevant projects');
    expect(service.requests[0].systemPrompt).toContain('most relevant projects');
  });

  it('should insert job descriptions with braces and dollar signs verbatim', async () => {
    const service = new ScriptedService('[1]');
    const jobDescription = 'Pay: $$ {slots} $& per year';

    await rankPool(projects, 1, PROJECT_DESCRIPTOR, makeContext(service, { jobDescription }));

    expect(service.prompt()).toContain('JOB DESCRIPTION:\nPay: $$ {slots} $& per year');
  });
});

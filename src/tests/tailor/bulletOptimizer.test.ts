/**
 * Tests for the shape-preserving bullet optimizer
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { optimizeBullets, parseBulletLines } from '../../tailor/optimizer/bulletOptimizer';
import { buildOptimizePrompt } from '../../tailor/optimizer/prompts';
import { ScriptedService, makeContext } from './helpers';

const options = { context: 'Experience at Acme as Engineer', concise: false };

describe('parseBulletLines', () => {
  it('should read bullets behind any supported marker', () => {
    expect(parseBulletLines('• First\n- Second\n* Third')).toEqual(['First', 'Second', 'Third']);
  });

  it('should skip prose lines and empty bullets', () => {
    const reply = 'Here are the optimized bullets:\n\n  •   Led the migration  \n-\nThanks!';

    expect(parseBulletLines(reply)).toEqual(['Led the migration']);
  });

  it('should return nothing for a reply without bullets', () => {
    expect(parseBulletLines('I could not do that.')).toEqual([]);
  });
});

describe('buildOptimizePrompt', () => {
  it('should target 120 characters by default', () => {
    const prompt = buildOptimizePrompt({ bullets: ['Did a thing'], jobDescription: 'JD', context: 'Project: X using Go', concise: false });

    expect(prompt).toContain('Keep each bullet point under 120 characters when possible');
    expect(prompt).not.toContain('EXTRA CONCISE MODE');
    expect(prompt).toContain('CONTEXT: Project: X using Go\n\nORIGINAL BULLET POINTS:\n• Did a thing');
  });

  it('should target 80 characters in concise mode', () => {
    const prompt = buildOptimizePrompt({ bullets: ['Did a thing'], jobDescription: 'JD', context: 'ctx', concise: true });

    expect(prompt).toContain('Keep each bullet point under 80 characters when possible');
    expect(prompt).toContain('EXTRA CONCISE MODE: Remove all unnecessary words.');
  });

  it('should add a note for prioritized items', () => {
    const prompt = buildOptimizePrompt({ bullets: ['Did a thing'], jobDescription: 'JD', context: 'ctx', concise: false, priority: 'high' });

    expect(prompt).toContain('CONTEXT: ctx\n\nNOTE: This is a high priority item. This should always be included');
  });
});

describe('optimizeBullets', () => {
  it('should accept a reply with the same number of bullets', async () => {
    const service = new ScriptedService('• Built REST APIs in TypeScript\n• Led on-call rotation');

    const result = await optimizeBullets(['Built APIs', 'Ran on-call'], options, makeContext(service));

    expect(result).toEqual(['Built REST APIs in TypeScript', 'Led on-call rotation']);
    expect(service.requests[0].temperature).toBe(0.3);
    expect(service.requests[0].maxTokens).toBe(1000);
  });

  it('should keep the originals when the count changes', async () => {
    const service = new ScriptedService('• Merged first and second\n• Third');
    const bullets = ['First', 'Second', 'Third'];

    const result = await optimizeBullets(bullets, options, makeContext(service));

    expect(result).toEqual(['First', 'Second', 'Third']);
    expect(result).not.toBe(bullets);
  });

  it('should keep the originals when the service fails', async () => {
    const service = new ScriptedService(new Error('timeout'));

    expect(await optimizeBullets(['Only one'], options, makeContext(service))).toEqual(['Only one']);
  });

  it('should not call the service for an empty list', async () => {
    const service = new ScriptedService();

    expect(await optimizeBullets([], options, makeContext(service))).toEqual([]);
    expect(service.calls).toBe(0);
  });

  it('should return the originals in dry-run', async () => {
    expect(await optimizeBullets(['A', 'B'], options, makeContext())).toEqual(['A', 'B']);
  });

  it('should always return exactly as many bullets as it was given', async () => {
    const bulletArb = fc.string({ minLength: 1, maxLength: 20 }).filter(s => s.trim().length > 0);

    await fc.assert(
      fc.asyncProperty(fc.array(bulletArb, { maxLength: 6 }), fc.string(), async (bullets, reply) => {
        const result = await optimizeBullets(bullets, options, makeContext(new ScriptedService(reply)));

        expect(result).toHaveLength(bullets.length);
      })
    );
  });
});

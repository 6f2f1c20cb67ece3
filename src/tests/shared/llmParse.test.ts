/**
 * Tests for reply parsing and prompt utilities
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { parseJsonResponse, parseJsonText, stripCodeFences } from '../../shared/llm/parse';
import { fillPrompt, formatList, truncateText } from '../../shared/llm/prompts';

describe('LLM Reply Parsing', () => {
  it('should strip markdown fences', () => {
    expect(stripCodeFences('```json\n[1, 2]\n```')).toBe('[1, 2]');
    expect(stripCodeFences('```\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it('should parse clean JSON', () => {
    expect(parseJsonText('{"selected": [1, 3]}')).toEqual({ ok: true, value: { selected: [1, 3] } });
  });

  it('should reject JSON wrapped in prose', () => {
    const result = parseJsonText('Sure! Here you go: ["Go", "Rust"] Let me know.');

    expect(result.ok).toBe(false);
  });

  it('should reject a reply cut off mid-array', () => {
    const result = parseJsonText('[3, 2');

    expect(result).toMatchObject({ ok: false, reason: expect.stringContaining('Response is not valid JSON') });
    expect(result).toMatchObject({ reason: expect.stringContaining('Preview: [3, 2') });
  });

  it('should reject malformed JSON instead of repairing it', () => {
    expect(parseJsonText('[1, 2, 3,]').ok).toBe(false);
    expect(parseJsonText('```json\n{"intro": "Hello",\n```').ok).toBe(false);
  });

  it('should report an empty reply', () => {
    expect(parseJsonText('   ')).toEqual({ ok: false, reason: 'Empty response' });
  });

  it('should report a shape mismatch', () => {
    const result = parseJsonResponse('{"selected": [1]}', z.array(z.number()));

    expect(result).toEqual({ ok: false, reason: 'Unexpected response shape: (root): Expected array, received object' });
  });

  it('should return validated data', () => {
    const result = parseJsonResponse('```json\n{"name": "Go"}\n```', z.object({ name: z.string() }));

    expect(result).toEqual({ ok: true, value: { name: 'Go' } });
  });
});

describe('Prompt Utilities', () => {
  it('should fill placeholders once and keep unknown ones', () => {
    const prompt = fillPrompt('Job: {job}\nSlots: {slots}\nOther: {other}', {
      job: 'Pays $1,000 {slots} $&',
      slots: '2'
    });

    expect(prompt).toBe('Job: Pays $1,000 {slots} $&\nSlots: 2\nOther: {other}');
  });

  it('should format bullet lists', () => {
    expect(formatList(['One', 'Two'])).toBe('• One\n• Two');
    expect(formatList(['One'], '-')).toBe('- One');
  });

  it('should truncate at a word boundary', () => {
    expect(truncateText('short', 10)).toBe('short');
    expect(truncateText('alpha beta gamma', 12)).toBe('alpha beta...');
  });
});

/**
 * Response Parsing
 *
 * Reads structured JSON out of service replies. A surrounding markdown fence
 * is stripped; anything else that is not valid JSON, including a reply cut
 * off at the token limit, is reported as a failed ParseResult, never thrown
 * and never repaired.
 */

import type { z } from 'zod';
import type { ParseResult } from './types';
import { truncateText } from './prompts';

const PREVIEW_LENGTH = 200;

/**
 * Remove a surrounding ```json ... ``` block if present
 */
export function stripCodeFences(text: string): string {
  return text
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '')
    .trim();
}

function tryParse(text: string): ParseResult<unknown> {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Parse raw JSON from a reply, without any shape check
 */
export function parseJsonText(text: string): ParseResult<unknown> {
  const cleaned = stripCodeFences(text);
  if (!cleaned) {
    return { ok: false, reason: 'Empty response' };
  }

  const parsed = tryParse(cleaned);
  if (!parsed.ok) {
    return {
      ok: false,
      reason: `Response is not valid JSON: ${parsed.reason}. Preview: ${truncateText(cleaned, PREVIEW_LENGTH)}`
    };
  }
  return parsed;
}

/**
 * Parse a reply and validate it against a zod schema
 */
export function parseJsonResponse<T>(
  text: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): ParseResult<T> {
  const parsed = parseJsonText(text);
  if (!parsed.ok) {
    return parsed;
  }

  const result = schema.safeParse(parsed.value);
  if (!result.success) {
    const issues = result.error.errors
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { ok: false, reason: `Unexpected response shape: ${issues}` };
  }

  return { ok: true, value: result.data };
}

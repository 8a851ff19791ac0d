/**
 * Parsing and normalization of LLM extraction responses
 */

import {
  type ExtractionResponse,
  type PublicationYear,
  ExtractionResponseSchema,
  UNKNOWN_YEAR,
} from './types.js';

export interface ParsedMetadata {
  authorSurname: string;
  authorInitial: string;
  year: PublicationYear;
  title: string;
  abstract: string;
}

export type ParseOutcome =
  | { ok: true; value: ParsedMetadata }
  | { ok: false; reason: string };

const CODE_FENCE = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/;

/**
 * Strips a surrounding Markdown code fence, if any.
 */
export function unwrapCodeFence(content: string): string {
  const trimmed = content.trim();
  const match = CODE_FENCE.exec(trimmed);
  return match?.[1] !== undefined ? match[1].trim() : trimmed;
}

/**
 * A 4-digit year, or `'unknown'` when none can be read from the value.
 *
 * @example
 * normalizeYear('Published 2019') // 2019
 * normalizeYear('n.d.')           // 'unknown'
 */
export function normalizeYear(value: unknown): PublicationYear {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 1000 && value <= 9999 ? value : UNKNOWN_YEAR;
  }

  if (typeof value === 'string') {
    const match = /(?<!\d)([1-9]\d{3})(?!\d)/.exec(value);
    if (match?.[1] !== undefined) {
      return Number.parseInt(match[1], 10);
    }
  }

  return UNKNOWN_YEAR;
}

function toText(value: string | number | null): string {
  return value === null ? '' : String(value).trim();
}

function normalize(response: ExtractionResponse): ParsedMetadata {
  return {
    authorSurname: toText(response.author_surname),
    authorInitial: toText(response.author_initial),
    year: normalizeYear(response.year),
    title: toText(response.title),
    abstract: toText(response.abstract),
  };
}

/**
 * Parses the model's text into metadata. Malformed JSON and missing keys are
 * both reported as a failed outcome, never thrown.
 */
export function parseExtractionResponse(content: string): ParseOutcome {
  let json: unknown;
  try {
    json = JSON.parse(unwrapCodeFence(content));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, reason: `Malformed JSON: ${reason}` };
  }

  const result = ExtractionResponseSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.errors
      .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
      .join(', ');
    return { ok: false, reason: `Schema mismatch: ${issues}` };
  }

  return { ok: true, value: normalize(result.data) };
}

/**
 * FILE PURPOSE: Extract a JSON object from raw model output
 *
 * WHY: Models wrap JSON in markdown fences, prepend prose, or leave trailing
 *      commas even when told to return bare JSON.
 * HOW: Strip an optional code fence, then try the whole text, then the first
 *      balanced {...} span. Each candidate goes through progressive repair
 *      (direct parse → manual fixes → jsonrepair).
 *
 * DEPENDENCIES: jsonrepair (npm)
 *
 * LAST UPDATED: 2026-10-18
 */

import { jsonrepair } from 'jsonrepair';

export type ExtractionStrategy = 'full_text' | 'balanced_object';

export interface ExtractionResult {
  data: unknown;
  strategy: ExtractionStrategy;
  /** true when the text needed repair before it parsed. */
  repaired: boolean;
}

export class JsonExtractionError extends Error {
  constructor(preview: string) {
    super(`Unable to find JSON in model response. Preview: "${preview}"`);
    this.name = 'JsonExtractionError';
  }
}

const FENCE_PATTERN = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?\s*```$/;

/**
 * Remove a surrounding markdown code fence (```json ... ``` or ``` ... ```).
 * Text without a fence is returned trimmed.
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = FENCE_PATTERN.exec(trimmed);
  return match?.[1] !== undefined ? match[1].trim() : trimmed;
}

/**
 * Extract and parse the JSON object in a model response.
 *
 * @throws JsonExtractionError when no candidate parses, even after repair
 *
 * EXAMPLE:
 * ```typescript
 * extractJson('```json\n{"confidence_score": 0.4,}\n```');
 * // { data: { confidence_score: 0.4 }, strategy: 'full_text', repaired: true }
 * ```
 */
export function extractJson(text: string): ExtractionResult {
  const body = stripCodeFence(text);

  const candidates: Array<[ExtractionStrategy, string | null]> = [
    ['full_text', body.startsWith('{') && body.endsWith('}') ? body : null],
    ['balanced_object', findBalancedObject(body)],
  ];

  for (const [strategy, candidate] of candidates) {
    if (!candidate) continue;
    const parsed = parseWithRepair(candidate);
    if (parsed) {
      return { data: parsed.value, strategy, repaired: parsed.repaired };
    }
  }

  const preview = text.substring(0, 200).replace(/\n/g, ' ');
  throw new JsonExtractionError(`${preview}${text.length > 200 ? '...' : ''}`);
}

/** First {...} span with matching brace depth, ignoring braces inside strings. */
function findBalancedObject(text: string): string | null {
  const startIndex = text.indexOf('{');
  if (startIndex === -1) return null;

  let depth = 0;
  let inString = false;
  let escapeNext = false;

  for (let i = startIndex; i < text.length; i++) {
    const char = text[i];

    if (escapeNext) {
      escapeNext = false;
      continue;
    }
    if (char === '\\') {
      escapeNext = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (char === '{') depth++;
    if (char === '}') {
      depth--;
      if (depth === 0) {
        return text.substring(startIndex, i + 1);
      }
    }
  }

  return null;
}

function parseWithRepair(jsonText: string): { value: unknown; repaired: boolean } | null {
  try {
    return { value: JSON.parse(jsonText), repaired: false };
  } catch {
    // fall through to repairs
  }

  const manual = jsonText
    .replace(/,(\s*[}\]])/g, '$1')
    .replace(/\/\*[\s\S]*?\*\//g, '');

  try {
    return { value: JSON.parse(manual), repaired: true };
  } catch {
    // fall through to jsonrepair
  }

  try {
    return { value: JSON.parse(jsonrepair(manual)), repaired: true };
  } catch {
    return null;
  }
}

/**
 * FILE PURPOSE: Build the per-request evaluation context
 *
 * WHY: The assessor judges an answer better when it knows which tools ran and
 *      which part numbers they surfaced. The context is a value threaded
 *      through the call chain, never agent-wide state, so concurrent requests
 *      cannot write into each other's context.
 * HOW: Every helper returns a new frozen object.
 */

import { isRecord } from './records.js';
import type { EvaluationContext } from './types.js';

const MAX_PARTS_PER_TOOL = 5;
const MAX_PARTS_FROM_RESPONSE = 5;
const PART_NUMBER_PATTERN = /\b[A-Z0-9]{6,12}\b/g;

export function createEvaluationContext(init: Partial<EvaluationContext> = {}): EvaluationContext {
  return Object.freeze({
    toolsUsed: Object.freeze([...(init.toolsUsed ?? [])]),
    partsFound: Object.freeze([...(init.partsFound ?? [])]),
    conversationTurns: Math.max(0, Math.floor(init.conversationTurns ?? 0)),
    isToolResult: init.isToolResult ?? false,
    ...(init.toolName !== undefined ? { toolName: init.toolName } : {}),
  });
}

function partNumberOf(value: unknown): string | null {
  if (!isRecord(value)) return null;
  const partNumber = value.part_number;
  return typeof partNumber === 'string' && partNumber.length > 0 ? partNumber : null;
}

/**
 * Record a tool call. Part numbers are collected from successful
 * search_parts results (first 5) and get_part_details lookups.
 */
export function recordToolUsage(
  context: EvaluationContext,
  toolName: string,
  result: unknown,
): EvaluationContext {
  const partsFound = [...context.partsFound];

  if (isRecord(result) && result.found === true) {
    if (toolName === 'search_parts' && Array.isArray(result.results)) {
      for (const part of result.results.slice(0, MAX_PARTS_PER_TOOL)) {
        const partNumber = partNumberOf(part);
        if (partNumber) partsFound.push(partNumber);
      }
    } else if (toolName === 'get_part_details') {
      const partNumber = partNumberOf(result);
      if (partNumber) partsFound.push(partNumber);
    }
  }

  return createEvaluationContext({
    ...context,
    toolsUsed: [...context.toolsUsed, toolName],
    partsFound,
  });
}

/** Part-number-like tokens mentioned in a response, first 5. */
export function extractPartNumbers(responseText: string): string[] {
  return (responseText.match(PART_NUMBER_PATTERN) ?? []).slice(0, MAX_PARTS_FROM_RESPONSE);
}

/** Replace partsFound with the identifiers the response itself mentions, when it mentions any. */
export function withResponsePartNumbers(context: EvaluationContext, responseText: string): EvaluationContext {
  const mentioned = extractPartNumbers(responseText);
  if (mentioned.length === 0) return context;
  return createEvaluationContext({ ...context, partsFound: mentioned });
}

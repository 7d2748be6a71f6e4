/**
 * FILE PURPOSE: Condense structured tool results into short text for screening
 *
 * WHY: Tool output (catalog hits, compatibility verdicts, guides) is screened
 *      by the same assessor as chat text, as a digest of at most 200 characters.
 * HOW: Capability table keyed on tool name. The `satisfies` clause makes a
 *      missing summarizer a compile error; unknown tools get a truncated
 *      JSON dump.
 *
 * LAST UPDATED: 2026-10-18
 */

import { isRecord } from './records.js';

export const MAX_SUMMARY_LENGTH = 200;

export type SummarizedToolName =
  | 'search_parts'
  | 'check_compatibility'
  | 'get_installation_guide'
  | 'get_troubleshooting_guide'
  | 'get_part_details';

type ToolSummarizer = (args: Readonly<Record<string, unknown>>, result: Readonly<Record<string, unknown>>) => string;

/** Render a scalar field, or 'Unknown' when it is missing or not a scalar. */
function field(value: unknown, fallback = 'Unknown'): string {
  if (typeof value === 'string' && value.length > 0) return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return fallback;
}

function listOf(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function recordOf(value: unknown): Readonly<Record<string, unknown>> {
  return isRecord(value) ? value : {};
}

const SUMMARIZERS = {
  search_parts: (_args, result) => {
    if (result.found !== true) return 'No parts found for search query';
    const parts = listOf(result.results);
    const listed = parts.slice(0, 3).map((entry) => {
      const part = recordOf(entry);
      return `${field(part.part_number)} (${field(part.name)}) - $${field(part.price)}`;
    });
    return `Found ${parts.length} parts: ${listed.join(', ')}`;
  },

  check_compatibility: (_args, result) => {
    const verdict = result.compatible === true ? 'compatible' : 'not compatible';
    return `Part ${field(result.part_number)} is ${verdict} with model ${field(result.model_number)}`;
  },

  get_installation_guide: (_args, result) => {
    if (result.found !== true) return 'No installation guide found';
    const steps = listOf(result.steps).length;
    return `Installation guide for ${field(result.part_name, 'part')} - ${steps} steps, estimated time: ${field(result.time_estimate)}`;
  },

  get_troubleshooting_guide: (_args, result) => {
    const issue = field(result.issue, 'unknown issue');
    if (result.found !== true) return `No troubleshooting guide found for ${issue}`;
    const causes = listOf(result.possible_causes).length;
    const solutions = listOf(result.solutions).length;
    return `Troubleshooting for ${issue} - ${causes} possible causes, ${solutions} solutions`;
  },

  get_part_details: (_args, result) => {
    if (result.found !== true) return `No details found for part ${field(result.part_number)}`;
    return `Part details for ${field(result.part_number)}: ${field(result.name)} - $${field(result.price)}`;
  },
} satisfies Record<SummarizedToolName, ToolSummarizer>;

export function isSummarizedTool(toolName: string): toolName is SummarizedToolName {
  return Object.hasOwn(SUMMARIZERS, toolName);
}

function genericSummary(result: unknown): string {
  try {
    return JSON.stringify(result) ?? String(result);
  } catch {
    // circular or BigInt values
    return String(result);
  }
}

/** Deterministic digest of a tool result, at most MAX_SUMMARY_LENGTH code points. */
export function summarizeToolResult(
  toolName: string,
  toolArgs: Readonly<Record<string, unknown>>,
  toolResult: Readonly<Record<string, unknown>>,
): string {
  const summary = isSummarizedTool(toolName)
    ? SUMMARIZERS[toolName](toolArgs, toolResult)
    : genericSummary(toolResult);

  return Array.from(summary).slice(0, MAX_SUMMARY_LENGTH).join('');
}

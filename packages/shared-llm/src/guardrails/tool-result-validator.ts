/**
 * FILE PURPOSE: Screen a single tool result before the responder uses it
 *
 * HOW: Summarize the structured result, evaluate the summary with the same
 *      assessor used for chat answers, and annotate (never alter or drop)
 *      results the assessor is confident are fabricated. Failures return the
 *      result untouched.
 */

import type { Logger } from '../logger.js';
import { createEvaluationContext } from './context.js';
import type { RiskEvaluator } from './risk-evaluator.js';
import { summarizeToolResult } from './tool-result-summarizer.js';
import type { EvaluateOptions } from './types.js';

/** Confidence above which a flagged tool result is annotated. */
export const TOOL_RESULT_FLAG_CONFIDENCE = 0.8;

export const TOOL_RESULT_WARNING = 'Tool result may contain inaccurate information';

export interface ToolResultWarning {
  guardrail_warning: string;
  guardrail_confidence: number;
}

export type ScreenedToolResult<T> = T | (T & ToolResultWarning);

function describeArgs(toolArgs: Readonly<Record<string, unknown>>): string {
  try {
    return JSON.stringify(toolArgs);
  } catch {
    // unserializable args still get a query line
    return String(toolArgs);
  }
}

export async function validateToolResult<T extends Readonly<Record<string, unknown>>>(
  evaluator: RiskEvaluator,
  logger: Logger,
  toolName: string,
  toolArgs: Readonly<Record<string, unknown>>,
  toolResult: T,
  options: EvaluateOptions = {},
): Promise<ScreenedToolResult<T>> {
  if (toolResult.error) return toolResult;

  const summary = summarizeToolResult(toolName, toolArgs, toolResult);
  const assessment = await evaluator.evaluate(
    `Tool: ${toolName} with args: ${describeArgs(toolArgs)}`,
    summary,
    createEvaluationContext({ isToolResult: true, toolName }),
    options,
  );

  if (assessment.isFlagged && assessment.confidence > TOOL_RESULT_FLAG_CONFIDENCE) {
    logger.warn(
      { toolName, confidence: assessment.confidence, reasons: assessment.reasons },
      'Tool result flagged as potentially hallucinated',
    );
    return {
      ...toolResult,
      guardrail_warning: TOOL_RESULT_WARNING,
      guardrail_confidence: assessment.confidence,
    };
  }

  return toolResult;
}

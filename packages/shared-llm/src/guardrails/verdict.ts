/**
 * FILE PURPOSE: Turn raw assessor output into a RiskAssessment
 *
 * WHY: The assessor's reply is untrusted input. Required fields must be
 *      present and typed; everything else is validated per field and replaced
 *      with a safe default when out of range or unrecognized, instead of
 *      failing the whole evaluation.
 *
 * LAST UPDATED: 2026-10-18
 */

import { z } from 'zod';
import { extractJson } from '../json-extractor.js';
import { VerdictParseError } from './errors.js';
import type { RiskAssessment } from './types.js';

const lowercase = (value: unknown): unknown =>
  typeof value === 'string' ? value.trim().toLowerCase() : value;

export const VerdictSchema = z.object({
  is_hallucination: z.boolean(),
  confidence_score: z.number().finite().transform((score) => Math.max(0, Math.min(1, score))),
  reasons: z
    .array(z.unknown())
    .catch([])
    .transform((items) => items.filter((item): item is string => typeof item === 'string')),
  specific_issues: z.record(z.unknown()).catch({}),
  severity: z.preprocess(lowercase, z.enum(['low', 'medium', 'high'])).catch('low'),
  recommendation: z.preprocess(lowercase, z.enum(['allow', 'warn', 'block'])).catch('allow'),
});

export type Verdict = z.infer<typeof VerdictSchema>;

/**
 * Parse and validate assessor output.
 *
 * @throws VerdictParseError when no JSON object is found or a required field
 *         (is_hallucination, confidence_score) is missing or mistyped
 */
export function parseVerdict(rawResponse: string, evaluationModel: string): RiskAssessment {
  let data: unknown;
  try {
    data = extractJson(rawResponse).data;
  } catch (err) {
    throw new VerdictParseError('JSON parsing failed', rawResponse, err);
  }

  const result = VerdictSchema.safeParse(data);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join('.') || '(root)');
    throw new VerdictParseError(`Verdict failed validation: ${fields.join(', ')}`, rawResponse, result.error);
  }

  const verdict = result.data;
  return Object.freeze({
    isFlagged: verdict.is_hallucination,
    confidence: verdict.confidence_score,
    severity: verdict.severity,
    recommendation: verdict.recommendation,
    reasons: Object.freeze([...verdict.reasons]),
    rawDetails: Object.freeze({
      specificIssues: verdict.specific_issues,
      severity: verdict.severity,
      recommendation: verdict.recommendation,
      evaluationModel,
    }),
    degraded: false,
  });
}

/** Fail-open placeholder used whenever the assessor cannot produce a verdict. */
export function degradedAssessment(reason: string, rawDetails: Record<string, unknown>): RiskAssessment {
  return Object.freeze({
    isFlagged: false,
    confidence: 0,
    severity: 'low',
    recommendation: 'allow',
    reasons: Object.freeze([reason]),
    rawDetails: Object.freeze({ ...rawDetails }),
    degraded: true,
  });
}

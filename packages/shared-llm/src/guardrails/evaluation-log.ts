/**
 * FILE PURPOSE: Structured log record for one guardrail evaluation
 *
 * WHY: Every screened response is logged for offline review of the
 *      assessor's calls. Full texts are not logged; previews plus SHA-256
 *      hashes let reviewers match a record to a transcript.
 */

import { createHash } from 'node:crypto';
import type { GuardedResponse, GuardrailAction, RiskAssessment } from './types.js';

const PREVIEW_LENGTH = 100;
const MAX_LOGGED_REASONS = 3;

export interface EvaluationLogRecord {
  queryPreview: string;
  queryHash: string;
  responsePreview: string;
  responseHash: string;
  isFlagged: boolean;
  confidence: number;
  action: GuardrailAction;
  evaluated: boolean;
  degraded: boolean;
  reasons: string[];
  severity: string;
}

function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

export function preview(text: string): string {
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
}

/** Build the record for a finished evaluation. `finalText` is what the customer sees. */
export function createEvaluationLog(
  query: string,
  outcome: GuardedResponse,
  assessment: RiskAssessment,
): EvaluationLogRecord {
  return {
    queryPreview: preview(query),
    queryHash: sha256(query),
    responsePreview: preview(outcome.finalText),
    responseHash: sha256(outcome.finalText),
    isFlagged: assessment.isFlagged,
    confidence: outcome.confidence,
    action: outcome.action,
    evaluated: outcome.evaluated,
    degraded: outcome.degraded,
    reasons: outcome.reasons.slice(0, MAX_LOGGED_REASONS),
    severity: assessment.degraded ? 'unknown' : assessment.severity,
  };
}

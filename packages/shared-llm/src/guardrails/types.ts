/**
 * FILE PURPOSE: Type definitions for the response-safety guardrail
 *
 * WHY: Every assistant answer and tool result is screened by a secondary model
 *      before it reaches the customer. These types describe the assessment
 *      that model produces, the policy decision taken on it, and the
 *      machine-readable verdict attached to every response.
 *
 * LAST UPDATED: 2026-10-18
 */

/** Qualitative magnitude of harm reported by the risk assessor. */
export type RiskSeverity = 'low' | 'medium' | 'high';

/** Action suggested by the risk assessor. Advisory only. */
export type RiskRecommendation = 'allow' | 'warn' | 'block';

/** Final, authoritative guardrail action. */
export type GuardrailAction = 'allow' | 'warn' | 'block' | 'log';

/** Which decision-table rule produced an action. */
export type PolicyRule =
  | 'hard_override'
  | 'threshold'
  | 'warn_floor'
  | 'recommended_allow'
  | 'default_log';

/** Normalized verdict from one evaluation call. Created fresh per call and frozen. */
export interface RiskAssessment {
  /** The assessor's binary judgment (is_hallucination). */
  readonly isFlagged: boolean;
  /** 0–1, higher means more likely problematic. Clamped on ingestion. */
  readonly confidence: number;
  readonly severity: RiskSeverity;
  readonly recommendation: RiskRecommendation;
  /** Human-readable justifications, in the order the assessor gave them. */
  readonly reasons: readonly string[];
  /** Opaque pass-through for logging (sub-assessments, errors, raw output). */
  readonly rawDetails: Readonly<Record<string, unknown>>;
  /** true when the assessor could not run and this is the fail-open placeholder. */
  readonly degraded: boolean;
}

/** Output of the action policy for a single assessment. */
export interface Decision {
  readonly action: GuardrailAction;
  readonly rule: PolicyRule;
  readonly confidence: number;
  readonly reasons: readonly string[];
}

/**
 * Per-request context threaded through evaluate → decide → mitigate.
 * Never stored on shared state; each request builds its own.
 */
export interface EvaluationContext {
  /** Tool names invoked while producing the response, in call order. */
  readonly toolsUsed: readonly string[];
  /** Part identifiers surfaced by tools or mentioned in the response. */
  readonly partsFound: readonly string[];
  /** Number of prior turns in the conversation. */
  readonly conversationTurns: number;
  /** true when the text under evaluation is a tool-result summary. */
  readonly isToolResult: boolean;
  readonly toolName?: string;
}

/** Metadata attached by the mitigator to every evaluated response. */
export interface MitigationMetadata {
  readonly evaluated: true;
  readonly action: GuardrailAction;
  readonly confidence: number;
  /** Present for warn and block only. */
  readonly reasons?: readonly string[];
}

export interface MitigationResult {
  readonly finalText: string;
  readonly metadata: MitigationMetadata;
}

/** What the surrounding chat agent receives for every screened answer. */
export interface GuardedResponse {
  readonly finalText: string;
  /** false when the guardrail is disabled or the evaluation degraded. */
  readonly evaluated: boolean;
  readonly action: GuardrailAction;
  readonly confidence: number;
  readonly reasons: readonly string[];
  /** true when the assessor failed and the response passed through unscreened. */
  readonly degraded: boolean;
  readonly severity?: RiskSeverity;
}

/** Per-call options for anything that reaches the risk assessor. */
export interface EvaluateOptions {
  /** Caller-level cancellation (e.g. the overall chat-turn deadline). */
  signal?: AbortSignal;
}

/**
 * FILE PURPOSE: Map a risk assessment to a guardrail action
 *
 * WHY: The assessor's own recommendation is advisory. The action taken on a
 *      response is decided here, deterministically, from confidence, severity
 *      and recommendation plus the configured threshold.
 * HOW: Ordered decision table; the first matching rule wins, so ties are
 *      broken by rule order rather than magnitude. Total: every assessment
 *      maps to exactly one action.
 *
 * LAST UPDATED: 2026-10-18
 */

import type { GuardrailConfiguration } from './config.js';
import type { Decision, GuardrailAction, PolicyRule, RiskAssessment } from './types.js';

/** allow < log < warn < block. */
export const ACTION_STRICTNESS: Readonly<Record<GuardrailAction, number>> = {
  allow: 0,
  log: 1,
  warn: 2,
  block: 3,
};

type PolicyConfig = Pick<GuardrailConfiguration, 'threshold' | 'hardBlockConfidence' | 'warnConfidence'>;

function decision(action: GuardrailAction, rule: PolicyRule, assessment: RiskAssessment): Decision {
  return Object.freeze({
    action,
    rule,
    confidence: assessment.confidence,
    reasons: assessment.reasons,
  });
}

/**
 * Decide the action for an assessment.
 *
 * 1. confidence >= hardBlockConfidence and severity high → block (independent of threshold)
 * 2. confidence >= threshold or recommendation block → block when severity is high/medium, else warn
 * 3. confidence >= warnConfidence or recommendation warn → warn
 * 4. recommendation allow → allow
 * 5. otherwise → log
 */
export function decidePolicyAction(assessment: RiskAssessment, config: PolicyConfig): Decision {
  const { confidence, severity, recommendation } = assessment;

  if (confidence >= config.hardBlockConfidence && severity === 'high') {
    return decision('block', 'hard_override', assessment);
  }

  if (confidence >= config.threshold || recommendation === 'block') {
    const action = severity === 'high' || severity === 'medium' ? 'block' : 'warn';
    return decision(action, 'threshold', assessment);
  }

  if (confidence >= config.warnConfidence || recommendation === 'warn') {
    return decision('warn', 'warn_floor', assessment);
  }

  if (recommendation === 'allow') {
    return decision('allow', 'recommended_allow', assessment);
  }

  return decision('log', 'default_log', assessment);
}

/**
 * Apply the preset toggles to a policy decision.
 *
 * blockHighConfidence=false turns block into warn; warnMediumConfidence=false
 * turns warn into log. A hard_override block is never demoted. The decision
 * table itself never reads the toggles.
 */
export function enforceToggles(
  policyDecision: Decision,
  config: Pick<GuardrailConfiguration, 'blockHighConfidence' | 'warnMediumConfidence'>,
): Decision {
  if (policyDecision.rule === 'hard_override') return policyDecision;

  let action = policyDecision.action;

  if (action === 'block' && !config.blockHighConfidence) action = 'warn';
  if (action === 'warn' && !config.warnMediumConfidence) action = 'log';

  return action === policyDecision.action
    ? policyDecision
    : Object.freeze({ ...policyDecision, action });
}

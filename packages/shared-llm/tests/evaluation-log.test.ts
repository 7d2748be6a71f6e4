import { describe, it, expect } from 'vitest';
import { createEvaluationLog, preview } from '../src/guardrails/evaluation-log.js';
import { degradedAssessment } from '../src/guardrails/verdict.js';
import type { GuardedResponse, RiskAssessment } from '../src/guardrails/types.js';

const assessment: RiskAssessment = {
  isFlagged: true,
  confidence: 0.55,
  severity: 'medium',
  recommendation: 'warn',
  reasons: ['a', 'b', 'c', 'd'],
  rawDetails: {},
  degraded: false,
};

const outcome: GuardedResponse = {
  finalText: 'Yes, we stock them.',
  evaluated: true,
  action: 'warn',
  confidence: 0.55,
  reasons: ['a', 'b', 'c', 'd'],
  degraded: false,
  severity: 'medium',
};

describe('preview', () => {
  it('keeps short text as-is', () => {
    expect(preview('short')).toBe('short');
  });

  it('truncates long text to 100 characters plus ellipsis', () => {
    expect(preview('y'.repeat(150))).toBe(`${'y'.repeat(100)}...`);
  });
});

describe('createEvaluationLog', () => {
  it('records previews, hashes and the outcome', () => {
    expect(createEvaluationLog('Do you sell ice makers?', outcome, assessment)).toEqual({
      queryPreview: 'Do you sell ice makers?',
      queryHash: '941cf2231ee713fc317436559271203bf942272459f495ce48f0c13ea451d2bb',
      responsePreview: 'Yes, we stock them.',
      responseHash: expect.stringMatching(/^[0-9a-f]{64}$/),
      isFlagged: true,
      confidence: 0.55,
      action: 'warn',
      evaluated: true,
      degraded: false,
      reasons: ['a', 'b', 'c'],
      severity: 'medium',
    });
  });

  it('marks severity unknown for degraded evaluations', () => {
    const record = createEvaluationLog(
      'q',
      { ...outcome, action: 'log', evaluated: false, degraded: true, confidence: 0, reasons: ['Evaluation service error'] },
      degradedAssessment('Evaluation service error', {}),
    );
    expect(record.severity).toBe('unknown');
    expect(record.isFlagged).toBe(false);
    expect(record.reasons).toEqual(['Evaluation service error']);
  });
});

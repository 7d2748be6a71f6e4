import { describe, it, expect, vi, afterEach } from 'vitest';
import { RiskEvaluator } from '../src/guardrails/risk-evaluator.js';
import { createGuardrailConfig } from '../src/guardrails/config.js';
import { createEvaluationContext } from '../src/guardrails/context.js';
import { EVALUATION_SYSTEM_PROMPT } from '../src/guardrails/prompt.js';
import { createLogger } from '../src/logger.js';
import type { TextGenerationRequest } from '../src/text-generator.js';

function setup(timeoutSeconds = 8) {
  const generate = vi.fn<(request: TextGenerationRequest) => Promise<string>>();
  const evaluator = new RiskEvaluator({
    client: { generate },
    config: createGuardrailConfig({ evaluationTimeoutSeconds: timeoutSeconds }),
    logger: createLogger({ level: 'silent' }),
  });
  return { generate, evaluator };
}

function verdict(fields: Record<string, unknown>): string {
  return JSON.stringify({
    is_hallucination: true,
    confidence_score: 0.95,
    reasons: ['Part number MAGIC123XYZ does not match any known format'],
    specific_issues: { part_accuracy: 'fabricated' },
    severity: 'high',
    recommendation: 'block',
    ...fields,
  });
}

describe('RiskEvaluator', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('turns a valid verdict into an assessment', async () => {
    const { generate, evaluator } = setup();
    generate.mockResolvedValue(verdict({}));

    const result = await evaluator.evaluate('What fixes my ice maker?', 'Use MAGIC123XYZ.');

    expect(result).toEqual({
      isFlagged: true,
      confidence: 0.95,
      severity: 'high',
      recommendation: 'block',
      reasons: ['Part number MAGIC123XYZ does not match any known format'],
      rawDetails: {
        specificIssues: { part_accuracy: 'fabricated' },
        severity: 'high',
        recommendation: 'block',
        evaluationModel: 'deepseek-chat',
      },
      degraded: false,
    });
  });

  it('sends the evaluation prompt at low temperature', async () => {
    const { generate, evaluator } = setup();
    generate.mockResolvedValue(verdict({}));

    await evaluator.evaluate(
      'Is PS11752778 compatible with WDT780SAEM1?',
      'Yes, it fits.',
      createEvaluationContext({ toolsUsed: ['check_compatibility'], partsFound: ['PS11752778'], conversationTurns: 2 }),
    );

    const request = generate.mock.calls[0]?.[0];
    expect(request?.systemPrompt).toBe(EVALUATION_SYSTEM_PROMPT);
    expect(request?.temperature).toBe(0.1);
    expect(request?.maxOutputTokens).toBe(1000);
    expect(request?.prompt).toContain('USER QUERY:\nIs PS11752778 compatible with WDT780SAEM1?');
    expect(request?.prompt).toContain('ASSISTANT RESPONSE:\nYes, it fits.');
    expect(request?.prompt).toContain(
      'Tools used: check_compatibility\nParts found in database: 1 (examples: PS11752778)\nPrevious conversation turns: 2',
    );
  });

  it('accepts a verdict wrapped in a code fence', async () => {
    const { generate, evaluator } = setup();
    generate.mockResolvedValue('```json\n' + verdict({ confidence_score: 0.1, is_hallucination: false }) + '\n```');

    const result = await evaluator.evaluate('q', 'r');
    expect(result.degraded).toBe(false);
    expect(result.confidence).toBe(0.1);
    expect(result.isFlagged).toBe(false);
  });

  it('clamps confidence into [0, 1]', async () => {
    const { generate, evaluator } = setup();
    generate.mockResolvedValueOnce(verdict({ confidence_score: 1.4 }));
    generate.mockResolvedValueOnce(verdict({ confidence_score: -0.2 }));

    expect((await evaluator.evaluate('q', 'r')).confidence).toBe(1);
    expect((await evaluator.evaluate('q', 'r')).confidence).toBe(0);
  });

  it('normalizes enum case and defaults unknown values', async () => {
    const { generate, evaluator } = setup();
    generate.mockResolvedValueOnce(verdict({ severity: 'HIGH', recommendation: 'Warn' }));
    generate.mockResolvedValueOnce(verdict({ severity: 'extreme', recommendation: 'escalate' }));

    const first = await evaluator.evaluate('q', 'r');
    expect(first.severity).toBe('high');
    expect(first.recommendation).toBe('warn');

    const second = await evaluator.evaluate('q', 'r');
    expect(second.severity).toBe('low');
    expect(second.recommendation).toBe('allow');
  });

  it('drops non-string reasons and tolerates missing optional fields', async () => {
    const { generate, evaluator } = setup();
    generate.mockResolvedValue(JSON.stringify({ is_hallucination: false, confidence_score: 0.2, reasons: ['ok', 7, null] }));

    const result = await evaluator.evaluate('q', 'r');
    expect(result.reasons).toEqual(['ok']);
    expect(result.severity).toBe('low');
    expect(result.recommendation).toBe('allow');
    expect(result.rawDetails.specificIssues).toEqual({});
  });

  it('degrades when a required field is missing', async () => {
    const { generate, evaluator } = setup();
    generate.mockResolvedValue(JSON.stringify({ confidence_score: 0.9, severity: 'high' }));

    const result = await evaluator.evaluate('q', 'r');
    expect(result.degraded).toBe(true);
    expect(result.confidence).toBe(0);
    expect(result.reasons).toEqual(['Evaluation service error']);
    expect(result.rawDetails.error).toBe('Verdict failed validation: is_hallucination');
  });

  it('degrades when the output is not JSON', async () => {
    const { generate, evaluator } = setup();
    generate.mockResolvedValue('not json');

    const result = await evaluator.evaluate('q', 'r');
    expect(result).toEqual({
      isFlagged: false,
      confidence: 0,
      severity: 'low',
      recommendation: 'allow',
      reasons: ['Evaluation service error'],
      rawDetails: { error: 'JSON parsing failed', rawResponse: 'not json' },
      degraded: true,
    });
  });

  it('degrades when the client rejects', async () => {
    const { generate, evaluator } = setup();
    generate.mockRejectedValue(new Error('503 upstream unavailable'));

    const result = await evaluator.evaluate('q', 'r');
    expect(result.degraded).toBe(true);
    expect(result.reasons).toEqual(['Evaluation error: 503 upstream unavailable']);
    expect(result.rawDetails).toEqual({ error: '503 upstream unavailable', errorType: 'Error' });
  });

  it('degrades on timeout and aborts the in-flight call', async () => {
    vi.useFakeTimers();
    const { generate, evaluator } = setup(8);
    generate.mockReturnValue(new Promise<string>(() => {}));

    const pending = evaluator.evaluate('q', 'r');
    await vi.advanceTimersByTimeAsync(8000);
    const result = await pending;

    expect(result.degraded).toBe(true);
    expect(result.reasons).toEqual(['Evaluation error: Risk evaluation timed out after 8s']);
    expect(result.rawDetails.errorType).toBe('EvaluationTimeoutError');
    expect(generate.mock.calls[0]?.[0].signal?.aborted).toBe(true);
  });

  it('does not time out a call that finishes in time', async () => {
    vi.useFakeTimers();
    const { generate, evaluator } = setup(8);
    generate.mockImplementation(
      () => new Promise<string>((resolve) => setTimeout(() => resolve(verdict({})), 7000)),
    );

    const pending = evaluator.evaluate('q', 'r');
    await vi.advanceTimersByTimeAsync(7000);
    const result = await pending;

    expect(result.degraded).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('degrades without calling the model when the caller already cancelled', async () => {
    const { generate, evaluator } = setup();
    const controller = new AbortController();
    controller.abort();

    const result = await evaluator.evaluate('q', 'r', createEvaluationContext(), { signal: controller.signal });

    expect(generate).not.toHaveBeenCalled();
    expect(result.reasons).toEqual(['Evaluation error: Risk evaluation cancelled by caller']);
  });

  it('degrades when the caller cancels mid-call', async () => {
    const { generate, evaluator } = setup();
    generate.mockReturnValue(new Promise<string>(() => {}));
    const controller = new AbortController();

    const pending = evaluator.evaluate('q', 'r', createEvaluationContext(), { signal: controller.signal });
    controller.abort();
    const result = await pending;

    expect(result.degraded).toBe(true);
    expect(result.rawDetails.errorType).toBe('EvaluationAbortedError');
    expect(generate.mock.calls[0]?.[0].signal?.aborted).toBe(true);
  });
});

/**
 * FILE PURPOSE: Ask the secondary model whether an answer is risky
 *
 * WHY: Factual and safety risk in a parts answer (made-up part numbers,
 *      dangerous installation steps, implausible prices) cannot be caught by
 *      patterns; a second model judges it against a domain checklist.
 * HOW: Render the evaluation prompt, call the TextGenerationClient at low
 *      temperature under a hard deadline, parse and validate the verdict.
 *      evaluate() never rejects: any failure (outage, timeout, cancellation,
 *      malformed output) yields a degraded assessment with confidence 0, so
 *      an unreachable assessor never blocks legitimate traffic.
 *
 * LAST UPDATED: 2026-10-18
 */

import type { TextGenerationClient, TextGenerationRequest } from '../text-generator.js';
import type { Logger } from '../logger.js';
import type { GuardrailConfiguration } from './config.js';
import { EvaluationAbortedError, EvaluationTimeoutError, VerdictParseError } from './errors.js';
import { EVALUATION_SYSTEM_PROMPT, buildEvaluationPrompt } from './prompt.js';
import { createEvaluationContext } from './context.js';
import { degradedAssessment, parseVerdict } from './verdict.js';
import type { EvaluateOptions, EvaluationContext, RiskAssessment } from './types.js';

export const EVALUATION_TEMPERATURE = 0.1;
export const EVALUATION_MAX_OUTPUT_TOKENS = 1000;

export interface RiskEvaluatorOptions {
  client: TextGenerationClient;
  config: GuardrailConfiguration;
  logger: Logger;
}

export class RiskEvaluator {
  private readonly client: TextGenerationClient;
  private readonly config: GuardrailConfiguration;
  private readonly logger: Logger;

  constructor(options: RiskEvaluatorOptions) {
    this.client = options.client;
    this.config = options.config;
    this.logger = options.logger;
  }

  async evaluate(
    userQuery: string,
    candidateResponse: string,
    context: EvaluationContext = createEvaluationContext(),
    options: EvaluateOptions = {},
  ): Promise<RiskAssessment> {
    let rawResponse: string;
    try {
      rawResponse = await generateWithDeadline(
        this.client,
        {
          prompt: buildEvaluationPrompt(userQuery, candidateResponse, context),
          systemPrompt: EVALUATION_SYSTEM_PROMPT,
          temperature: EVALUATION_TEMPERATURE,
          maxOutputTokens: EVALUATION_MAX_OUTPUT_TOKENS,
        },
        this.config.evaluationTimeoutSeconds,
        options.signal,
      );
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn({ err, toolName: context.toolName }, 'Risk evaluation failed; continuing unscreened');
      return degradedAssessment(`Evaluation error: ${message}`, {
        error: message,
        errorType: err instanceof Error ? err.name : 'unknown',
      });
    }

    try {
      return parseVerdict(rawResponse, this.config.model);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      const raw = err instanceof VerdictParseError ? err.rawResponse : rawResponse;
      this.logger.error({ error: message, rawResponse: raw }, 'Failed to parse evaluation verdict');
      return degradedAssessment('Evaluation service error', {
        error: message,
        rawResponse: raw,
      });
    }
  }
}

/**
 * Run one generation call bounded by a timeout and an optional caller signal.
 *
 * The client receives an AbortSignal that fires on either; the timer and the
 * caller listener are released on every exit path.
 */
export async function generateWithDeadline(
  client: TextGenerationClient,
  request: Omit<TextGenerationRequest, 'signal'>,
  timeoutSeconds: number,
  callerSignal?: AbortSignal,
): Promise<string> {
  if (callerSignal?.aborted) {
    throw new EvaluationAbortedError(callerSignal.reason);
  }

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onCallerAbort: (() => void) | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new EvaluationTimeoutError(timeoutSeconds));
    }, timeoutSeconds * 1000);

    if (callerSignal) {
      onCallerAbort = () => {
        controller.abort();
        reject(new EvaluationAbortedError(callerSignal.reason));
      };
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
  });

  const generation = (async () => client.generate({ ...request, signal: controller.signal }))();

  try {
    return await Promise.race([generation, deadline]);
  } finally {
    clearTimeout(timer);
    if (callerSignal && onCallerAbort) {
      callerSignal.removeEventListener('abort', onCallerAbort);
    }
  }
}

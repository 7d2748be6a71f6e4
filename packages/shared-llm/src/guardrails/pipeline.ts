/**
 * FILE PURPOSE: The guardrail entry point used by the chat agent
 *
 * WHY: One call screens an answer end to end and always returns a verdict the
 *      agent can attach to its response. Nothing here rejects.
 * HOW: evaluate → decide → enforce preset toggles → mitigate, strictly in
 *      sequence, with all request state passed as arguments. The only shared
 *      object is the frozen configuration (plus the optional monitor, whose
 *      counters only increment).
 *
 * LAST UPDATED: 2026-10-18
 */

import { createLLMClient } from '../llm-client.js';
import { createLogger, type Logger } from '../logger.js';
import { createChatTextGenerator, type TextGenerationClient } from '../text-generator.js';
import { decidePolicyAction, enforceToggles } from './action-policy.js';
import { loadGuardrailConfig, type GuardrailConfiguration } from './config.js';
import { createEvaluationContext, withResponsePartNumbers } from './context.js';
import { createEvaluationLog } from './evaluation-log.js';
import type { EvaluationMonitor } from './evaluation-monitor.js';
import { applyMitigation } from './response-mitigator.js';
import { RiskEvaluator } from './risk-evaluator.js';
import { validateToolResult, type ScreenedToolResult } from './tool-result-validator.js';
import type {
  Decision,
  EvaluateOptions,
  EvaluationContext,
  GuardedResponse,
  RiskAssessment,
} from './types.js';

export interface ResponseGuardrailOptions {
  config: GuardrailConfiguration;
  client: TextGenerationClient;
  logger?: Logger;
  monitor?: EvaluationMonitor;
}

export class ResponseGuardrail {
  readonly config: GuardrailConfiguration;
  private readonly evaluator: RiskEvaluator;
  private readonly logger: Logger;
  private readonly monitor: EvaluationMonitor | undefined;

  constructor(options: ResponseGuardrailOptions) {
    this.config = options.config;
    this.logger = options.logger ?? createLogger();
    this.monitor = options.monitor;
    this.evaluator = new RiskEvaluator({
      client: options.client,
      config: options.config,
      logger: this.logger,
    });
  }

  /**
   * Screen a candidate answer and apply the resulting action.
   *
   * Degraded evaluations pass the answer through unchanged with
   * `evaluated: false` and action 'log'.
   */
  async evaluateAndMitigate(
    userQuery: string,
    candidateResponse: string,
    context: EvaluationContext = createEvaluationContext(),
    options: EvaluateOptions = {},
  ): Promise<GuardedResponse> {
    if (!this.config.enabled) {
      return passThrough(candidateResponse, 'allow', [], false);
    }

    try {
      const assessment = await this.evaluator.evaluate(
        userQuery,
        candidateResponse,
        withResponsePartNumbers(context, candidateResponse),
        options,
      );

      if (assessment.degraded) {
        const outcome = passThrough(candidateResponse, 'log', assessment.reasons, true);
        this.monitor?.recordDegraded(assessment.reasons[0] ?? 'unknown');
        this.logOutcome(userQuery, outcome, assessment);
        return outcome;
      }

      const policyDecision = decidePolicyAction(assessment, this.config);
      const enforced = enforceToggles(policyDecision, this.config);
      const { finalText, metadata } = applyMitigation(candidateResponse, enforced, userQuery);

      const outcome: GuardedResponse = {
        finalText,
        evaluated: metadata.evaluated,
        action: metadata.action,
        confidence: metadata.confidence,
        reasons: metadata.reasons ?? [],
        degraded: false,
        severity: assessment.severity,
      };

      this.monitor?.recordEvaluation(outcome.action);
      this.logOutcome(userQuery, outcome, assessment, policyDecision);
      return outcome;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ err }, 'Guardrail pipeline failed; returning response unscreened');
      this.monitor?.recordDegraded(message);
      return passThrough(candidateResponse, 'log', [`Guardrail error: ${message}`], true);
    }
  }

  /** Screen a structured tool result; see validateToolResult(). */
  async validateToolResult<T extends Readonly<Record<string, unknown>>>(
    toolName: string,
    toolArgs: Readonly<Record<string, unknown>>,
    toolResult: T,
    options: EvaluateOptions = {},
  ): Promise<ScreenedToolResult<T>> {
    if (!this.config.enabled) return toolResult;

    try {
      return await validateToolResult(this.evaluator, this.logger, toolName, toolArgs, toolResult, options);
    } catch (err) {
      this.logger.warn({ err, toolName }, 'Tool result validation failed; using result as-is');
      return toolResult;
    }
  }

  private logOutcome(
    query: string,
    outcome: GuardedResponse,
    assessment: RiskAssessment,
    policyDecision?: Decision,
  ): void {
    const record = {
      ...createEvaluationLog(query, outcome, assessment),
      ...(policyDecision ? { rule: policyDecision.rule, policyAction: policyDecision.action } : {}),
    };

    if (outcome.action === 'block') {
      this.logger.warn(record, 'Guardrail blocked response');
    } else if (outcome.action === 'warn') {
      this.logger.info(record, 'Guardrail warned on response');
    } else if (this.config.logAllEvaluations || outcome.degraded) {
      this.logger.info(record, 'Guardrail evaluated response');
    } else {
      this.logger.debug(record, 'Guardrail evaluated response');
    }
  }
}

function passThrough(
  candidateResponse: string,
  action: 'allow' | 'log',
  reasons: readonly string[],
  degraded: boolean,
): GuardedResponse {
  return {
    finalText: candidateResponse,
    evaluated: false,
    action,
    confidence: 0,
    reasons,
    degraded,
  };
}

/**
 * Build a guardrail from environment variables: configuration via
 * loadGuardrailConfig(), assessor via the OpenAI-compatible client.
 *
 * USAGE:
 *   const guardrail = createResponseGuardrail();
 *   const verdict = await guardrail.evaluateAndMitigate(query, answer, context);
 */
export function createResponseGuardrail(
  env: NodeJS.ProcessEnv = process.env,
  extras: { logger?: Logger; monitor?: EvaluationMonitor } = {},
): ResponseGuardrail {
  const config = loadGuardrailConfig(env);
  const client = createChatTextGenerator({
    model: config.model,
    client: createLLMClient({ baseURL: config.baseUrl, apiKey: env.GUARDRAIL_LLM_API_KEY ?? '' }),
  });

  return new ResponseGuardrail({ config, client, ...extras });
}

/**
 * FILE PURPOSE: Error classes raised inside the guardrail
 *
 * HOW: None of these escape the public surface. RiskEvaluator catches them and
 *      returns a degraded assessment whose reason carries the message.
 */

export class EvaluationTimeoutError extends Error {
  constructor(timeoutSeconds: number) {
    super(`Risk evaluation timed out after ${timeoutSeconds}s`);
    this.name = 'EvaluationTimeoutError';
  }
}

export class EvaluationAbortedError extends Error {
  constructor(reason?: unknown) {
    super('Risk evaluation cancelled by caller', reason === undefined ? undefined : { cause: reason });
    this.name = 'EvaluationAbortedError';
  }
}

export class VerdictParseError extends Error {
  /** The assessor output that could not be turned into a verdict. */
  readonly rawResponse: string;

  constructor(message: string, rawResponse: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'VerdictParseError';
    this.rawResponse = rawResponse;
  }
}

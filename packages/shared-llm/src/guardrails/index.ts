/**
 * FILE PURPOSE: Barrel export for the response-safety guardrail
 *
 * WHY: Single import point for the pipeline and its stages.
 *      Import: `import { createResponseGuardrail } from '@parts-assistant/shared-llm'`
 */

export { ResponseGuardrail, createResponseGuardrail } from './pipeline.js';
export type { ResponseGuardrailOptions } from './pipeline.js';

export { RiskEvaluator, generateWithDeadline, EVALUATION_TEMPERATURE, EVALUATION_MAX_OUTPUT_TOKENS } from './risk-evaluator.js';
export type { RiskEvaluatorOptions } from './risk-evaluator.js';

export { decidePolicyAction, enforceToggles, ACTION_STRICTNESS } from './action-policy.js';
export { applyMitigation, BLOCKED_RESPONSE_FALLBACK, WARNING_SUFFIX } from './response-mitigator.js';
export { summarizeToolResult, isSummarizedTool, MAX_SUMMARY_LENGTH } from './tool-result-summarizer.js';
export type { SummarizedToolName } from './tool-result-summarizer.js';
export { validateToolResult, TOOL_RESULT_FLAG_CONFIDENCE, TOOL_RESULT_WARNING } from './tool-result-validator.js';
export type { ToolResultWarning, ScreenedToolResult } from './tool-result-validator.js';

export {
  createEvaluationContext,
  recordToolUsage,
  extractPartNumbers,
  withResponsePartNumbers,
} from './context.js';

export {
  loadGuardrailConfig,
  createGuardrailConfig,
  sanitizeGuardrailConfig,
  PRESETS,
  DEFAULT_HARD_BLOCK_CONFIDENCE,
  DEFAULT_WARN_CONFIDENCE,
  DEFAULT_MODEL,
  DEFAULT_BASE_URL,
} from './config.js';
export type { GuardrailConfiguration, GuardrailPreset, PresetSettings } from './config.js';

export { buildEvaluationPrompt, describeContext, EVALUATION_CRITERIA, EVALUATION_SYSTEM_PROMPT } from './prompt.js';
export { parseVerdict, degradedAssessment, VerdictSchema } from './verdict.js';
export type { Verdict } from './verdict.js';
export { EvaluationTimeoutError, EvaluationAbortedError, VerdictParseError } from './errors.js';

export { createEvaluationLog } from './evaluation-log.js';
export type { EvaluationLogRecord } from './evaluation-log.js';
export { EvaluationMonitor } from './evaluation-monitor.js';
export type { AlertLevel, DegradationEvent, EvaluationStats } from './evaluation-monitor.js';

export type {
  RiskSeverity,
  RiskRecommendation,
  GuardrailAction,
  PolicyRule,
  RiskAssessment,
  Decision,
  EvaluationContext,
  MitigationMetadata,
  MitigationResult,
  GuardedResponse,
  EvaluateOptions,
} from './types.js';

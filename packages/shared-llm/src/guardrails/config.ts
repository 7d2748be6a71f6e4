/**
 * FILE PURPOSE: Load the process-wide guardrail configuration from env
 *
 * WHY: The guardrail must always start in a well-defined state. A bad value in
 *      the environment is sanitized (preset default or clamped) instead of
 *      failing startup.
 * HOW: A named preset supplies the bundle; explicit env vars override single
 *      fields; the result is clamped and frozen. Read-only after load, so any
 *      number of concurrent requests can share it.
 *
 * LAST UPDATED: 2026-10-18
 */

import { z } from 'zod';

export type GuardrailPreset = 'strict' | 'balanced' | 'lenient' | 'monitoring_only';

export interface PresetSettings {
  threshold: number;
  blockHighConfidence: boolean;
  warnMediumConfidence: boolean;
  logAllEvaluations: boolean;
  evaluationTimeoutSeconds: number;
  description: string;
}

export interface GuardrailConfiguration {
  readonly enabled: boolean;
  readonly preset: GuardrailPreset;
  /** Primary discriminator between allow-ish and warn/block-ish confidence. */
  readonly threshold: number;
  /** When false, a block decision is enforced as a warning. */
  readonly blockHighConfidence: boolean;
  /** When false, a warn decision is enforced as log-only. */
  readonly warnMediumConfidence: boolean;
  readonly logAllEvaluations: boolean;
  /** Upper bound on one assessor call, in seconds. Always within [1, 30]. */
  readonly evaluationTimeoutSeconds: number;
  /** Confidence at which a high-severity finding always blocks. */
  readonly hardBlockConfidence: number;
  /** Confidence at which any finding at least warns. */
  readonly warnConfidence: number;
  readonly model: string;
  readonly baseUrl: string;
}

export const PRESETS: Readonly<Record<GuardrailPreset, PresetSettings>> = {
  strict: {
    threshold: 0.5,
    blockHighConfidence: true,
    warnMediumConfidence: true,
    logAllEvaluations: true,
    evaluationTimeoutSeconds: 10,
    description: 'Aggressive detection - blocks questionable responses',
  },
  balanced: {
    threshold: 0.7,
    blockHighConfidence: true,
    warnMediumConfidence: true,
    logAllEvaluations: false,
    evaluationTimeoutSeconds: 8,
    description: 'Blocks clear hallucinations, warns on concerns',
  },
  lenient: {
    threshold: 0.85,
    blockHighConfidence: false,
    warnMediumConfidence: true,
    logAllEvaluations: false,
    evaluationTimeoutSeconds: 5,
    description: 'Only warns, never blocks',
  },
  monitoring_only: {
    threshold: 0.3,
    blockHighConfidence: false,
    warnMediumConfidence: false,
    logAllEvaluations: true,
    evaluationTimeoutSeconds: 5,
    description: 'Logs every evaluation but never blocks or warns',
  },
};

export const DEFAULT_HARD_BLOCK_CONFIDENCE = 0.8;
export const DEFAULT_WARN_CONFIDENCE = 0.3;
export const DEFAULT_MODEL = 'deepseek-chat';
export const DEFAULT_BASE_URL = 'https://api.deepseek.com';

const MIN_TIMEOUT_SECONDS = 1;
const MAX_TIMEOUT_SECONDS = 30;

const PresetSchema = z.enum(['strict', 'balanced', 'lenient', 'monitoring_only']);

const EnvSchema = z.object({
  GUARDRAIL_ENABLED: z.string().optional(),
  GUARDRAIL_PRESET: z
    .string()
    .optional()
    .transform((value) => value?.trim().toLowerCase())
    .pipe(PresetSchema.catch('balanced')),
  GUARDRAIL_THRESHOLD: z.string().optional(),
  GUARDRAIL_BLOCK_HIGH: z.string().optional(),
  GUARDRAIL_WARN_MEDIUM: z.string().optional(),
  GUARDRAIL_LOG_ALL: z.string().optional(),
  GUARDRAIL_TIMEOUT: z.string().optional(),
  GUARDRAIL_HARD_BLOCK_CONFIDENCE: z.string().optional(),
  GUARDRAIL_WARN_CONFIDENCE: z.string().optional(),
  GUARDRAIL_MODEL: z.string().default(DEFAULT_MODEL),
  GUARDRAIL_LLM_BASE_URL: z.string().default(DEFAULT_BASE_URL),
});

function toBoolean(input: string | undefined, defaultValue: boolean): boolean {
  if (input === undefined) {
    return defaultValue;
  }

  const normalized = input.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }

  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  return defaultValue;
}

function toNumber(input: string | undefined, defaultValue: number): number {
  if (input === undefined || input.trim() === '') {
    return defaultValue;
  }

  const parsed = Number(input.trim());
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** Clamp every numeric field into its operative range and freeze. */
export function sanitizeGuardrailConfig(config: GuardrailConfiguration): GuardrailConfiguration {
  return Object.freeze({
    ...config,
    threshold: clamp(config.threshold, 0, 1),
    evaluationTimeoutSeconds: clamp(config.evaluationTimeoutSeconds, MIN_TIMEOUT_SECONDS, MAX_TIMEOUT_SECONDS),
    hardBlockConfidence: clamp(config.hardBlockConfidence, 0, 1),
    warnConfidence: clamp(config.warnConfidence, 0, 1),
  });
}

/** Build a configuration from a preset, with optional field overrides. Used by tests and embedders. */
export function createGuardrailConfig(
  overrides: Partial<GuardrailConfiguration> = {},
): GuardrailConfiguration {
  const preset = overrides.preset ?? 'balanced';
  const settings = PRESETS[preset];

  return sanitizeGuardrailConfig({
    enabled: true,
    preset,
    threshold: settings.threshold,
    blockHighConfidence: settings.blockHighConfidence,
    warnMediumConfidence: settings.warnMediumConfidence,
    logAllEvaluations: settings.logAllEvaluations,
    evaluationTimeoutSeconds: settings.evaluationTimeoutSeconds,
    hardBlockConfidence: DEFAULT_HARD_BLOCK_CONFIDENCE,
    warnConfidence: DEFAULT_WARN_CONFIDENCE,
    model: DEFAULT_MODEL,
    baseUrl: DEFAULT_BASE_URL,
    ...overrides,
  });
}

/**
 * Load the guardrail configuration from environment variables.
 *
 * Unknown presets fall back to 'balanced'. Unparseable numbers and booleans
 * fall back to the preset value. Never throws.
 */
export function loadGuardrailConfig(env: NodeJS.ProcessEnv = process.env): GuardrailConfiguration {
  const parsed = EnvSchema.parse(env);
  const preset = parsed.GUARDRAIL_PRESET;
  const settings = PRESETS[preset];

  return sanitizeGuardrailConfig({
    enabled: toBoolean(parsed.GUARDRAIL_ENABLED, true),
    preset,
    threshold: toNumber(parsed.GUARDRAIL_THRESHOLD, settings.threshold),
    blockHighConfidence: toBoolean(parsed.GUARDRAIL_BLOCK_HIGH, settings.blockHighConfidence),
    warnMediumConfidence: toBoolean(parsed.GUARDRAIL_WARN_MEDIUM, settings.warnMediumConfidence),
    logAllEvaluations: toBoolean(parsed.GUARDRAIL_LOG_ALL, settings.logAllEvaluations),
    evaluationTimeoutSeconds: toNumber(parsed.GUARDRAIL_TIMEOUT, settings.evaluationTimeoutSeconds),
    hardBlockConfidence: toNumber(parsed.GUARDRAIL_HARD_BLOCK_CONFIDENCE, DEFAULT_HARD_BLOCK_CONFIDENCE),
    warnConfidence: toNumber(parsed.GUARDRAIL_WARN_CONFIDENCE, DEFAULT_WARN_CONFIDENCE),
    model: parsed.GUARDRAIL_MODEL,
    baseUrl: parsed.GUARDRAIL_LLM_BASE_URL,
  });
}

/**
 * FILE PURPOSE: OpenAI-compatible client for the risk-assessor model
 *
 * WHY: The guardrail talks to an OpenAI-compatible endpoint (DeepSeek by
 *      default). Callers never construct the SDK client themselves.
 * HOW: Reads GUARDRAIL_LLM_BASE_URL / GUARDRAIL_LLM_API_KEY with explicit
 *      options taking precedence. SDK retries are disabled: the guardrail
 *      bounds each call with its own timeout and fails open instead.
 *
 * USAGE:
 *   import { createLLMClient } from '@parts-assistant/shared-llm';
 *   const llm = createLLMClient();
 *   const res = await llm.chat.completions.create({ model: 'deepseek-chat', ... });
 */
import OpenAI from 'openai';

export const DEFAULT_LLM_BASE_URL = 'https://api.deepseek.com';

export interface LLMClientOptions {
  apiKey?: string;
  baseURL?: string;
  /** Extra default headers, e.g. request tracing. */
  headers?: Record<string, string>;
}

export function createLLMClient(options?: string | LLMClientOptions): OpenAI {
  // Accept a raw apiKey string
  const opts: LLMClientOptions = typeof options === 'string'
    ? { apiKey: options }
    : options ?? {};

  const baseURL = opts.baseURL || process.env.GUARDRAIL_LLM_BASE_URL || DEFAULT_LLM_BASE_URL;
  const key = opts.apiKey ?? process.env.GUARDRAIL_LLM_API_KEY ?? '';

  return new OpenAI({
    baseURL,
    apiKey: key,
    maxRetries: 0,
    ...(opts.headers ? { defaultHeaders: opts.headers } : {}),
  });
}

export type { OpenAI };

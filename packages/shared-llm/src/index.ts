/**
 * FILE PURPOSE: Barrel export for the assistant's LLM utilities and guardrail
 *
 * WHY: Single import point.
 *      Import: `import { createResponseGuardrail, extractJson } from '@parts-assistant/shared-llm'`
 */

export { createLLMClient, DEFAULT_LLM_BASE_URL } from './llm-client.js';
export type { OpenAI, LLMClientOptions } from './llm-client.js';

export { createChatTextGenerator } from './text-generator.js';
export type {
  TextGenerationClient,
  TextGenerationRequest,
  ChatTextGeneratorOptions,
  ChatCompletionClient,
} from './text-generator.js';

export { extractJson, stripCodeFence, JsonExtractionError } from './json-extractor.js';
export type { ExtractionResult, ExtractionStrategy } from './json-extractor.js';

export { createLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';

// ─── Response-Safety Guardrail ──────────────────────────────────────────────
export * from './guardrails/index.js';

/**
 * FILE PURPOSE: The text-generation capability the guardrail consumes
 *
 * WHY: The risk assessor is an opaque "prompt in, text out" call with a
 *      failure mode (outage, rate limit, timeout). Keeping it behind an
 *      interface lets the guardrail be tested with in-process fakes.
 * HOW: createChatTextGenerator() adapts an OpenAI-compatible chat client.
 *      Errors propagate to the caller; RiskEvaluator owns the failure policy.
 */

import type OpenAI from 'openai';
import { createLLMClient } from './llm-client.js';

export interface TextGenerationRequest {
  prompt: string;
  systemPrompt?: string;
  temperature: number;
  maxOutputTokens: number;
  /** Aborted when the caller's deadline passes; implementations should stop work. */
  signal?: AbortSignal;
}

export interface TextGenerationClient {
  /** Resolve with the generated text; reject on outage, rate limit, empty output or abort. */
  generate(request: TextGenerationRequest): Promise<string>;
}

/** The slice of the OpenAI SDK the generator calls. An OpenAI instance satisfies it. */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal },
      ): PromiseLike<{ choices: Array<{ message?: { content?: string | null } }> }>;
    };
  };
}

export interface ChatTextGeneratorOptions {
  model: string;
  /** Defaults to createLLMClient(). */
  client?: ChatCompletionClient;
}

export function createChatTextGenerator(options: ChatTextGeneratorOptions): TextGenerationClient {
  const client: ChatCompletionClient = options.client ?? createLLMClient();

  return {
    async generate(request: TextGenerationRequest): Promise<string> {
      const messages: OpenAI.Chat.Completions.ChatCompletionMessageParam[] = [];
      if (request.systemPrompt) {
        messages.push({ role: 'system', content: request.systemPrompt });
      }
      messages.push({ role: 'user', content: request.prompt });

      const response = await client.chat.completions.create(
        {
          model: options.model,
          messages,
          temperature: request.temperature,
          max_tokens: request.maxOutputTokens,
        },
        request.signal ? { signal: request.signal } : undefined,
      );

      const content = response.choices[0]?.message?.content?.trim() ?? '';
      if (!content) {
        throw new Error(`Model ${options.model} returned an empty completion`);
      }
      return content;
    },
  };
}

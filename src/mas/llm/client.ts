/**
 * LLM Client — OpenAI-compatible chat completions with tool calling
 *
 * Works against OpenAI or any gateway that speaks the same wire format
 * (OpenRouter by default when OPENROUTER_API_KEY is set).
 */

import { z } from 'zod';
import { LLMError } from '../errors';
import type { LLMSettings } from '../config';

export interface ToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string;
  };
}

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string | null;
  tool_call_id?: string;
  tool_calls?: ToolCall[];
}

export interface ToolSchema {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: object;
  };
}

export interface LLMResponse {
  content: string | null;
  tool_calls?: ToolCall[];
}

export interface ChatOptions {
  model?: string;
  temperature?: number;
}

export interface LLMClient {
  chat(messages: LLMMessage[], tools?: ToolSchema[], options?: ChatOptions): Promise<LLMResponse>;
}

const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                type: z.literal('function').default('function'),
                function: z.object({ name: z.string(), arguments: z.string().default('{}') }),
              })
            )
            .optional(),
        }),
      })
    )
    .min(1),
});

/**
 * Create OpenAI-compatible LLM client
 */
export function createOpenAICompatibleClient(settings: LLMSettings): LLMClient {
  const { apiKey } = settings;
  if (!apiKey) {
    throw LLMError.apiKeyMissing();
  }

  return {
    async chat(messages, tools, options = {}) {
      const response = await fetch(`${settings.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${apiKey}`
        },
        body: JSON.stringify({
          model: options.model ?? settings.model,
          temperature: options.temperature ?? 0.2,
          messages: messages.map(m => ({
            role: m.role,
            content: m.content,
            ...(m.tool_call_id ? { tool_call_id: m.tool_call_id } : {}),
            ...(m.tool_calls ? { tool_calls: m.tool_calls } : {})
          })),
          ...(tools && tools.length > 0 ? { tools, tool_choice: 'auto' } : {})
        })
      });

      if (!response.ok) {
        throw LLMError.requestFailed(response.status, await response.text());
      }

      const parsed = CompletionSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw LLMError.responseInvalid(parsed.error.issues[0]?.message ?? 'unexpected shape');
      }

      const message = parsed.data.choices[0].message;
      return {
        content: message.content ?? null,
        tool_calls: message.tool_calls
      };
    }
  };
}

/**
 * Create LLM client from configuration
 */
export function createLLMClient(settings: LLMSettings): LLMClient {
  console.log(`[LLM] Using ${settings.baseUrl} (${settings.model})`);
  return createOpenAICompatibleClient(settings);
}

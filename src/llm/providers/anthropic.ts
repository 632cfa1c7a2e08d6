/**
 * Anthropic Messages API provider
 */

import { z } from 'zod';
import { BaseLLMProvider, type BaseProviderOptions } from './base.js';
import type { LLMMessage, LLMResponse, LLMGenerateOptions } from '../../types/llm.js';
import { ProviderError, RateLimitError } from '../../types/errors.js';
import { error, debug } from '../../utils/logger.js';

interface AnthropicMessage {
  role: 'user' | 'assistant';
  content: string;
}

interface AnthropicRequest {
  model: string;
  max_tokens: number;
  temperature: number;
  messages: AnthropicMessage[];
  system?: string;
  stop_sequences?: string[];
}

/** Response body shared by the Anthropic API and Anthropic models on Bedrock */
export const AnthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  usage: z
    .object({
      input_tokens: z.number(),
      output_tokens: z.number(),
    })
    .optional(),
});

export type AnthropicResponse = z.infer<typeof AnthropicResponseSchema>;

const ErrorBodySchema = z.object({ error: z.object({ message: z.string() }) });

/**
 * Split system prompts out of the conversation, as Anthropic models expect.
 */
export function toAnthropicMessages(messages: LLMMessage[]): { system: string; messages: AnthropicMessage[] } {
  const system = messages
    .filter((m) => m.role === 'system')
    .map((m) => m.content)
    .join('\n\n');
  const conversation = messages
    .filter((m) => m.role !== 'system')
    .map((msg): AnthropicMessage => ({
      role: msg.role === 'assistant' ? 'assistant' : 'user',
      content: msg.content,
    }));
  return { system, messages: conversation };
}

/**
 * Turn a parsed response body into an LLMResponse.
 */
export function readAnthropicResponse(data: AnthropicResponse, providerName: string): LLMResponse {
  const text = data.content.flatMap((c) => (c.type === 'text' && c.text !== undefined ? [c.text] : []));
  if (text.length === 0) {
    error(`${providerName} returned no content`);
    throw new ProviderError(`${providerName} returned no content`);
  }

  const usage = data.usage
    ? {
        promptTokens: data.usage.input_tokens,
        completionTokens: data.usage.output_tokens,
        totalTokens: data.usage.input_tokens + data.usage.output_tokens,
      }
    : undefined;

  return { content: text.join('\n'), usage };
}

/**
 * Map a Bedrock model ID such as `anthropic.claude-3-haiku-20240307-v1:0`
 * to the Anthropic API name `claude-3-haiku-20240307`. Other IDs pass through.
 */
export function anthropicModelName(modelId: string): string {
  const match = /^(?:[a-z]{2}\.)?anthropic\.(.+?)(?:-v\d+(?::\d+)?)?$/.exec(modelId);
  return match ? match[1] : modelId;
}

export class AnthropicProvider extends BaseLLMProvider {
  private readonly apiKey: string;
  private readonly baseUrl = 'https://api.anthropic.com/v1';

  constructor(apiKey: string | undefined, model: string, options?: BaseProviderOptions) {
    super(anthropicModelName(model), options);
    this.apiKey = apiKey ?? '';
  }

  async generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse> {
    return this.withRetry(() => this._generate(messages, options), 'Anthropic API request');
  }

  private validateApiKey(): void {
    if (this.apiKey.trim().length === 0) {
      error('Anthropic API key is required but not provided');
      throw new ProviderError('Anthropic API key is required (set apiKey or GCOVSMITH_API_KEY)');
    }
  }

  private async _generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse> {
    this.validateApiKey();
    const mergedOptions = this.mergeOptions(options);
    const { system, messages: conversation } = toAnthropicMessages(messages);

    const requestBody: AnthropicRequest = {
      model: this.model,
      max_tokens: mergedOptions.maxTokens,
      temperature: mergedOptions.temperature,
      messages: conversation,
      ...(system ? { system } : {}),
      ...(mergedOptions.stopSequences.length > 0 ? { stop_sequences: mergedOptions.stopSequences } : {}),
    };

    debug(`Calling Anthropic API with model: ${this.model}`);

    const response = await fetch(`${this.baseUrl}/messages`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.apiKey,
        'anthropic-version': '2023-06-01',
      },
      body: JSON.stringify(requestBody),
    });

    if (!response.ok) {
      const errorText = await response.text();
      let errorMessage = `Anthropic API error: ${response.status} ${response.statusText}`;

      let errorBody: unknown = null;
      try {
        errorBody = JSON.parse(errorText);
      } catch {
        errorBody = null;
      }
      const parsedError = ErrorBodySchema.safeParse(errorBody);
      if (parsedError.success) {
        errorMessage += ` - ${parsedError.data.error.message}`;
      } else if (errorText) {
        errorMessage += ` - ${errorText.substring(0, 200)}`;
      }

      if (response.status === 429) {
        const retryAfter = response.headers.get('retry-after');
        throw new RateLimitError(errorMessage, { retryAfter: retryAfter ? parseInt(retryAfter, 10) : null });
      }

      error(errorMessage);
      throw new ProviderError(errorMessage, response.status);
    }

    const parsed = AnthropicResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      error('Anthropic API returned an unexpected response body');
      throw new ProviderError('Anthropic API returned an unexpected response body');
    }

    const result = readAnthropicResponse(parsed.data, 'Anthropic API');
    this.logUsage(result.usage, 'Anthropic');
    return result;
  }
}

/**
 * AWS Bedrock provider for Anthropic models
 */

import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { BaseLLMProvider, type BaseProviderOptions } from './base.js';
import { AnthropicResponseSchema, readAnthropicResponse, toAnthropicMessages } from './anthropic.js';
import type { LLMMessage, LLMResponse, LLMGenerateOptions } from '../../types/llm.js';
import { ProviderError, RateLimitError } from '../../types/errors.js';
import { error, debug, describeError } from '../../utils/logger.js';

export const BEDROCK_ANTHROPIC_VERSION = 'bedrock-2023-05-31';

export interface BedrockCredentials {
  accessKeyId: string;
  secretAccessKey: string;
}

export interface BedrockProviderOptions extends BaseProviderOptions {
  region: string;
  /** Explicit keys; without them the SDK's default credential chain applies */
  credentials?: BedrockCredentials;
}

function httpStatusOf(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('$metadata' in err)) {
    return null;
  }
  const metadata: unknown = err.$metadata;
  if (typeof metadata !== 'object' || metadata === null || !('httpStatusCode' in metadata)) {
    return null;
  }
  return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : null;
}

/**
 * Normalise AWS SDK failures into provider errors the retry logic understands.
 */
export function toProviderError(err: unknown): ProviderError {
  if (err instanceof ProviderError) {
    return err;
  }

  const status = httpStatusOf(err);
  const name = err instanceof Error ? err.name : '';
  const message = `Bedrock request failed: ${describeError(err)}`;

  if (name === 'ThrottlingException' || status === 429) {
    return new RateLimitError(message);
  }
  return new ProviderError(message, status);
}

export class BedrockProvider extends BaseLLMProvider {
  private readonly client: BedrockRuntimeClient;

  constructor(model: string, options: BedrockProviderOptions) {
    super(model, options);
    this.client = new BedrockRuntimeClient({
      region: options.region,
      ...(options.credentials ? { credentials: options.credentials } : {}),
    });
  }

  async generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse> {
    return this.withRetry(() => this._generate(messages, options), 'Bedrock request');
  }

  private async _generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse> {
    const mergedOptions = this.mergeOptions(options);
    const { system, messages: conversation } = toAnthropicMessages(messages);

    const body = {
      anthropic_version: BEDROCK_ANTHROPIC_VERSION,
      max_tokens: mergedOptions.maxTokens,
      temperature: mergedOptions.temperature,
      messages: conversation,
      ...(system ? { system } : {}),
      ...(mergedOptions.stopSequences.length > 0 ? { stop_sequences: mergedOptions.stopSequences } : {}),
    };

    debug(`Calling Bedrock with model: ${this.model}`);

    let raw: string;
    try {
      const response = await this.client.send(
        new InvokeModelCommand({
          modelId: this.model,
          contentType: 'application/json',
          accept: 'application/json',
          body: JSON.stringify(body),
        })
      );
      raw = new TextDecoder().decode(response.body);
    } catch (err) {
      const providerError = toProviderError(err);
      error(providerError.message);
      throw providerError;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      data = null;
    }

    const parsed = AnthropicResponseSchema.safeParse(data);
    if (!parsed.success) {
      error('Bedrock returned an unexpected response body');
      throw new ProviderError('Bedrock returned an unexpected response body');
    }

    const result = readAnthropicResponse(parsed.data, 'Bedrock');
    this.logUsage(result.usage, 'Bedrock');
    return result;
  }
}

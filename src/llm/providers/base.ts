/**
 * Base LLM provider: option merging, usage logging and retries
 */

import type { LLMMessage, LLMResponse, LLMGenerateOptions, LLMProvider } from '../../types/llm.js';
import { ProviderError, RateLimitError } from '../../types/errors.js';
import { error, debug, warn, describeError } from '../../utils/logger.js';

export interface BaseProviderOptions {
  defaultOptions?: Partial<LLMGenerateOptions>;
  /** Retries after the first attempt for rate limits and 5xx responses */
  maxRetries?: number;
  /** Delay before the first retry in ms; doubles on every retry */
  baseRetryDelay?: number;
}

export function isRetryable(err: unknown): boolean {
  return err instanceof RateLimitError || (err instanceof ProviderError && err.isServerError);
}

export abstract class BaseLLMProvider implements LLMProvider {
  protected readonly model: string;
  protected readonly defaultOptions: Required<LLMGenerateOptions>;
  protected readonly maxRetries: number;
  protected readonly baseRetryDelay: number;

  constructor(model: string, options: BaseProviderOptions = {}) {
    this.model = model;
    this.defaultOptions = {
      temperature: options.defaultOptions?.temperature ?? 0.1,
      maxTokens: options.defaultOptions?.maxTokens ?? 4000,
      stopSequences: options.defaultOptions?.stopSequences ?? [],
    };
    this.maxRetries = options.maxRetries ?? 3;
    this.baseRetryDelay = options.baseRetryDelay ?? 1000;
  }

  abstract generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse>;

  protected mergeOptions(options?: LLMGenerateOptions): Required<LLMGenerateOptions> {
    return {
      temperature: options?.temperature ?? this.defaultOptions.temperature,
      maxTokens: options?.maxTokens ?? this.defaultOptions.maxTokens,
      stopSequences: options?.stopSequences ?? this.defaultOptions.stopSequences,
    };
  }

  protected logUsage(usage: LLMResponse['usage'], operation: string): void {
    if (usage) {
      debug(
        `${operation} usage: ${usage.totalTokens ?? 'unknown'} tokens ` +
          `(prompt: ${usage.promptTokens ?? 'unknown'}, completion: ${usage.completionTokens ?? 'unknown'})`
      );
    }
  }

  protected async withRetry<T>(fn: () => Promise<T>, operation: string, retries = this.maxRetries): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (!isRetryable(err)) {
        throw err;
      }

      if (retries <= 0) {
        error(`${operation} failed after ${this.maxRetries} retries: ${describeError(err)}`);
        throw err;
      }

      let delay = this.baseRetryDelay * Math.pow(2, this.maxRetries - retries);
      if (err instanceof RateLimitError && err.retryAfter !== null && err.retryAfter > 0) {
        delay = err.retryAfter * 1000;
      }

      const reason = err instanceof RateLimitError ? 'Rate limit exceeded' : 'Server error';
      warn(`${operation} failed: ${describeError(err)}`);
      warn(`${reason}. Retrying in ${Math.ceil(delay / 1000)}s... (${retries} retries left)`);

      await new Promise((resolve) => setTimeout(resolve, delay));
      return this.withRetry(fn, operation, retries - 1);
    }
  }
}

/**
 * LLM provider factory
 */

import type { GcovsmithConfig } from '../types/config.js';
import type { LLMProvider } from '../types/llm.js';
import { ConfigError } from '../types/errors.js';
import { AnthropicProvider } from './providers/anthropic.js';
import { BedrockProvider } from './providers/bedrock.js';
import { error } from '../utils/logger.js';

export type ProviderConfig = Pick<
  GcovsmithConfig,
  'provider' | 'region' | 'modelId' | 'maxTokens' | 'temperature' | 'awsAccessKeyId' | 'awsSecretAccessKey' | 'apiKey'
>;

/**
 * Create an LLM provider based on configuration
 */
export function createLLMProvider(config: ProviderConfig): LLMProvider {
  const defaultOptions = { maxTokens: config.maxTokens, temperature: config.temperature };

  switch (config.provider) {
    case 'bedrock': {
      const { awsAccessKeyId, awsSecretAccessKey } = config;
      const credentials =
        awsAccessKeyId && awsSecretAccessKey
          ? { accessKeyId: awsAccessKeyId, secretAccessKey: awsSecretAccessKey }
          : undefined;
      return new BedrockProvider(config.modelId, {
        region: config.region,
        defaultOptions,
        ...(credentials ? { credentials } : {}),
      });
    }
    case 'anthropic':
      return new AnthropicProvider(config.apiKey, config.modelId, { defaultOptions });
    case 'none':
      error('No LLM provider is configured');
      throw new ConfigError('No LLM provider is configured (provider is "none")');
  }
}

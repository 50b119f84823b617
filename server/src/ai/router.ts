import { ConfigurationError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { AnthropicProvider } from './anthropic-provider.js';
import { OpenAIProvider } from './openai-provider.js';
import type { ModelClient } from './provider.js';

export type ModelProviderName = 'openai' | 'anthropic';

export const DEFAULT_MODELS: Record<ModelProviderName, string> = {
  openai: 'gpt-4o',
  anthropic: 'claude-sonnet-4-20250514',
};

export interface ModelClientConfig {
  provider: ModelProviderName;
  openaiKey?: string;
  openaiBaseUrl?: string;
  anthropicKey?: string;
  defaultModel?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

/**
 * Build the model client for the configured provider.
 */
export function createModelClient(config: ModelClientConfig, logger?: Logger): ModelClient {
  const defaultModel = config.defaultModel || DEFAULT_MODELS[config.provider];
  const shared = {
    defaultModel,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
    timeoutMs: config.timeoutMs,
  };

  switch (config.provider) {
    case 'openai':
      if (!config.openaiKey) {
        throw new ConfigurationError(['OPENAI_API_KEY is required for the openai provider']);
      }
      return new OpenAIProvider({ ...shared, apiKey: config.openaiKey, baseUrl: config.openaiBaseUrl }, logger);
    case 'anthropic':
      if (!config.anthropicKey) {
        throw new ConfigurationError(['ANTHROPIC_API_KEY is required for the anthropic provider']);
      }
      return new AnthropicProvider({ ...shared, apiKey: config.anthropicKey }, logger);
  }
}

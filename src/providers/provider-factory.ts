import type { LLMProvider } from './llm-provider';
import { AnthropicProvider, type AnthropicConfig } from './anthropic-provider';
import { OpenAIProvider, type OpenAIConfig } from './openai-provider';
import type { EnvConfig } from '../schemas/env-schemas';
import { ConfigError } from '../errors/index';

export interface ProviderOptions {
  debug?: boolean;
  showPrompt?: boolean;
}

export enum ProviderType {
  OpenAI = 'openai',
  Anthropic = 'anthropic',
}

/**
 * Creates the LLM provider selected by LLM_PROVIDER.
 * @param envConfig - Validated environment configuration
 * @param options - Debug and display options
 */
export function createProvider(envConfig: EnvConfig, options: ProviderOptions = {}): LLMProvider {
  switch (envConfig.LLM_PROVIDER) {
    case ProviderType.OpenAI: {
      const openaiConfig: OpenAIConfig = {
        apiKey: envConfig.OPENAI_API_KEY,
        model: envConfig.OPENAI_MODEL,
        ...(envConfig.OPENAI_TEMPERATURE !== undefined && { temperature: envConfig.OPENAI_TEMPERATURE }),
        ...(envConfig.OPENAI_MAX_TOKENS !== undefined && { maxTokens: envConfig.OPENAI_MAX_TOKENS }),
        ...(options.debug !== undefined && { debug: options.debug }),
        ...(options.showPrompt !== undefined && { showPrompt: options.showPrompt }),
      };
      return new OpenAIProvider(openaiConfig);
    }

    case ProviderType.Anthropic: {
      const anthropicConfig: AnthropicConfig = {
        apiKey: envConfig.ANTHROPIC_API_KEY,
        model: envConfig.ANTHROPIC_MODEL,
        maxTokens: envConfig.ANTHROPIC_MAX_TOKENS,
        ...(envConfig.ANTHROPIC_TEMPERATURE !== undefined && { temperature: envConfig.ANTHROPIC_TEMPERATURE }),
        ...(options.debug !== undefined && { debug: options.debug }),
        ...(options.showPrompt !== undefined && { showPrompt: options.showPrompt }),
      };
      return new AnthropicProvider(anthropicConfig);
    }

    default: {
      const unknownProvider: never = envConfig;
      throw new ConfigError(`Unsupported provider type: ${String(unknownProvider)}`);
    }
  }
}

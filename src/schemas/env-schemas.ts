import { z } from 'zod';
import { ProviderType } from '../providers/provider-factory';
import { OpenAIDefaultConfig } from '../providers/openai-provider';
import { AnthropicDefaultConfig } from '../providers/anthropic-provider';

// OpenAI configuration schema
const OPENAI_CONFIG_SCHEMA = z.object({
  OPENAI_API_KEY: z.string().min(1),
  OPENAI_MODEL: z.string().default(OpenAIDefaultConfig.model),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).optional(),
  OPENAI_MAX_TOKENS: z.coerce.number().int().positive().optional(),
});

// Anthropic configuration schema
const ANTHROPIC_CONFIG_SCHEMA = z.object({
  ANTHROPIC_API_KEY: z.string().min(1),
  ANTHROPIC_MODEL: z.string().default(AnthropicDefaultConfig.model),
  ANTHROPIC_MAX_TOKENS: z.coerce.number().int().positive().default(AnthropicDefaultConfig.maxTokens),
  ANTHROPIC_TEMPERATURE: z.coerce.number().min(0).max(1).optional(),
});

// Optional per-million-token prices used for cost reporting
const PRICING_SCHEMA = z.object({
  INPUT_PRICE_PER_MILLION: z.coerce.number().nonnegative().optional(),
  OUTPUT_PRICE_PER_MILLION: z.coerce.number().nonnegative().optional(),
});

export const ENV_SCHEMA = z.discriminatedUnion('LLM_PROVIDER', [
  z.object({ LLM_PROVIDER: z.literal(ProviderType.OpenAI) }).merge(OPENAI_CONFIG_SCHEMA).merge(PRICING_SCHEMA),
  z.object({ LLM_PROVIDER: z.literal(ProviderType.Anthropic) }).merge(ANTHROPIC_CONFIG_SCHEMA).merge(PRICING_SCHEMA),
]);

// LLM_PROVIDER defaults to openai when unset
export const ENV_SCHEMA_WITH_DEFAULTS = z.preprocess(
  (data: unknown) => {
    if (typeof data === 'object' && data !== null && !('LLM_PROVIDER' in data && data.LLM_PROVIDER !== undefined)) {
      return { ...data, LLM_PROVIDER: ProviderType.OpenAI };
    }
    return data;
  },
  ENV_SCHEMA
);

export type EnvConfig = z.infer<typeof ENV_SCHEMA>;

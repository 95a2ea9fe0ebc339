import { z } from 'zod';
import { ENV_SCHEMA_WITH_DEFAULTS, type EnvConfig } from '../schemas/env-schemas';
import { ProviderType } from '../providers/provider-factory';
import { ConfigError, handleUnknownError } from '../errors/index';
import type { PricingConfig } from '../types/token-usage';

export function parseEnvironment(env: unknown = process.env): EnvConfig {
  try {
    return ENV_SCHEMA_WITH_DEFAULTS.parse(env);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      const errorMessage = formatProviderValidationError(e, env);
      throw new ConfigError(`Invalid environment variables: ${errorMessage}`);
    }
    const err = handleUnknownError(e, 'Environment validation');
    throw new ConfigError(`Environment validation failed: ${err.message}`);
  }
}

export function pricingFromEnvironment(envConfig: EnvConfig): PricingConfig {
  return {
    inputPricePerMillion: envConfig.INPUT_PRICE_PER_MILLION,
    outputPricePerMillion: envConfig.OUTPUT_PRICE_PER_MILLION,
  };
}

function readProvider(env: unknown): string | undefined {
  if (typeof env !== 'object' || env === null || !('LLM_PROVIDER' in env)) {
    return undefined;
  }
  const provider = env.LLM_PROVIDER;
  return typeof provider === 'string' ? provider : undefined;
}

function formatProviderValidationError(zodError: z.ZodError, env: unknown): string {
  const issues = zodError.issues;
  const providerType = readProvider(env);

  const discriminatorIssue = issues.find(issue =>
    issue.code === 'invalid_union_discriminator' ||
    (issue.path.length === 1 && issue.path[0] === 'LLM_PROVIDER')
  );

  if (discriminatorIssue) {
    return `LLM_PROVIDER must be either '${ProviderType.OpenAI}' or '${ProviderType.Anthropic}'. Received: ${providerType ?? 'undefined'}`;
  }

  const missingFields = issues
    .filter(issue => issue.code === 'invalid_type' && issue.received === 'undefined')
    .map(issue => issue.path.join('.'));

  if (missingFields.length > 0) {
    if (providerType === ProviderType.Anthropic) {
      const anthropicFields = missingFields.filter(field => field.startsWith('ANTHROPIC_'));
      if (anthropicFields.length > 0) {
        return `Missing required Anthropic environment variables: ${anthropicFields.join(', ')}. When using LLM_PROVIDER=anthropic, ensure ANTHROPIC_API_KEY is set.`;
      }
    } else {
      const openaiFields = missingFields.filter(field => field.startsWith('OPENAI_'));
      if (openaiFields.length > 0) {
        return `Missing required OpenAI environment variables: ${openaiFields.join(', ')}. When using LLM_PROVIDER=openai, ensure OPENAI_API_KEY is set.`;
      }
    }
  }

  const validationIssues = issues.filter(issue =>
    issue.code === 'invalid_string' ||
    issue.code === 'too_small' ||
    issue.code === 'too_big' ||
    issue.code === 'invalid_type'
  );

  if (validationIssues.length > 0) {
    const fieldErrors = validationIssues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    return `Invalid environment variable values: ${fieldErrors.join(', ')}`;
  }

  return zodError.message;
}

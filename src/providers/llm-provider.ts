import type { TokenUsage } from '../types/token-usage';

export interface LLMResult<T> {
  data: T;
  usage?: TokenUsage;
}

export interface StructuredSchema {
  name: string;
  schema: Record<string, unknown>;
}

// Per-call settings that take precedence over the provider's configuration
export interface RequestOverrides {
  model?: string | undefined;
  temperature?: number | undefined;
}

export interface LLMProvider {
  // Model the provider uses when a call does not override it
  readonly model: string;
  runPromptStructured<T = unknown>(
    content: string,
    promptText: string,
    schema: StructuredSchema,
    overrides?: RequestOverrides
  ): Promise<LLMResult<T>>;
}

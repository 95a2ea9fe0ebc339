import { z } from 'zod';

/**
 * Parameter schemas for the SDK error classes the provider tests fake
 */

export const MOCK_API_ERROR_PARAMS_SCHEMA = z.object({
  message: z.string(),
  status: z.number().optional(),
});

export const MOCK_NAMED_ERROR_PARAMS_SCHEMA = z.object({
  message: z.string().optional(),
});

export type MockAPIErrorParams = z.infer<typeof MOCK_API_ERROR_PARAMS_SCHEMA>;
export type MockNamedErrorParams = z.infer<typeof MOCK_NAMED_ERROR_PARAMS_SCHEMA>;

/**
 * Type-safe interfaces for mock client objects
 */

export interface MockOpenAIClient {
  chat: {
    completions: {
      create: (params: unknown) => Promise<unknown>;
    };
  };
}

export interface MockAnthropicClient {
  messages: {
    create: (params: unknown) => Promise<unknown>;
  };
}

import OpenAI from 'openai';
import { z } from 'zod';
import type { LLMProvider, LLMResult, RequestOverrides, StructuredSchema } from './llm-provider';
import { OPENAI_COMPLETION_SCHEMA, type OpenAICompletion } from '../schemas/api-schemas';
import { APIResponseError } from '../errors/validation-errors';
import { GenerationError, ValidationError, handleUnknownError } from '../errors/index';
import { log, warn } from '../output/logger';

export interface OpenAIConfig {
  apiKey: string;
  model?: string | undefined;
  temperature?: number | undefined;
  maxTokens?: number | undefined;
  debug?: boolean | undefined;
  showPrompt?: boolean | undefined;
}

export const OpenAIDefaultConfig = {
  model: 'gpt-4o',
  temperature: 0.2,
  maxTokens: 1500,
};

export class OpenAIProvider implements LLMProvider {
  private client: OpenAI;
  private config: OpenAIConfig & { model: string; temperature: number; maxTokens: number };

  constructor(config: OpenAIConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      maxRetries: 2,
    });
    this.config = {
      ...config,
      model: config.model ?? OpenAIDefaultConfig.model,
      temperature: config.temperature ?? OpenAIDefaultConfig.temperature,
      maxTokens: config.maxTokens ?? OpenAIDefaultConfig.maxTokens,
    };
  }

  get model(): string {
    return this.config.model;
  }

  /**
   * Validates OpenAI API response using schema validation
   */
  private validateResponse(response: unknown): OpenAICompletion {
    try {
      return OPENAI_COMPLETION_SCHEMA.parse(response);
    } catch (e: unknown) {
      if (e instanceof z.ZodError) {
        throw new APIResponseError(
          `Invalid OpenAI API response structure: ${e.message}`,
          response,
          e
        );
      }
      const err = handleUnknownError(e, 'OpenAI response validation');
      throw new ValidationError(`OpenAI response validation failed: ${err.message}`);
    }
  }

  async runPromptStructured<T = unknown>(
    content: string,
    promptText: string,
    schema: StructuredSchema,
    overrides: RequestOverrides = {}
  ): Promise<LLMResult<T>> {
    const model = overrides.model ?? this.config.model;
    const temperature = overrides.temperature ?? this.config.temperature;

    const params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
      model,
      temperature,
      max_tokens: this.config.maxTokens,
      messages: [
        { role: 'system', content: promptText },
        { role: 'user', content },
      ],
      response_format: {
        type: 'json_schema',
        json_schema: {
          name: schema.name,
          schema: schema.schema,
        },
      },
    };

    if (this.config.debug) {
      log('[faqforge] Sending request to OpenAI:', { model, temperature });
      if (this.config.showPrompt) {
        log('[faqforge] System prompt (full):');
        log(promptText);
        log('[faqforge] User content (full):');
        log(content);
      }
    }

    let rawResponse: unknown;
    try {
      rawResponse = await this.client.chat.completions.create(params);
    } catch (e: unknown) {
      // Check more specific SDK errors first; they all extend APIError
      if (e instanceof OpenAI.RateLimitError) {
        throw new GenerationError(`OpenAI rate limit exceeded: ${e.message}`, undefined, e);
      }
      if (e instanceof OpenAI.AuthenticationError) {
        throw new GenerationError(`OpenAI authentication failed: ${e.message}`, undefined, e);
      }
      if (e instanceof OpenAI.APIError) {
        throw new GenerationError(`OpenAI API error (${e.status}): ${e.message}`, undefined, e);
      }

      const err = handleUnknownError(e, 'OpenAI API call');
      throw new GenerationError(`OpenAI API call failed: ${err.message}`, undefined, e);
    }

    const validatedResponse = this.validateResponse(rawResponse);
    const usage = validatedResponse.usage;

    if (this.config.debug) {
      const firstChoice = validatedResponse.choices[0];
      log('[faqforge] LLM response meta:', {
        usage: usage
          ? {
              prompt_tokens: usage.prompt_tokens,
              completion_tokens: usage.completion_tokens,
            }
          : undefined,
        finish_reason: firstChoice?.finish_reason,
      });
    }

    const firstChoice = validatedResponse.choices[0];
    if (!firstChoice) {
      throw new APIResponseError('Empty response from OpenAI API (no choices).', rawResponse);
    }

    const responseText = firstChoice.message.content?.trim();
    if (!responseText) {
      throw new APIResponseError('Empty response from OpenAI API (no content).', rawResponse);
    }

    if (firstChoice.finish_reason === 'length') {
      warn('OpenAI response hit the token limit; structured output may be truncated');
    }

    let data: T;
    try {
      data = JSON.parse(responseText) as T;
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'JSON parsing');
      const preview = responseText.slice(0, 200);
      throw new ValidationError(
        `Failed to parse structured JSON response: ${err.message}. Preview: ${preview}${responseText.length > 200 ? ' ...' : ''}`
      );
    }

    return {
      data,
      ...(usage && {
        usage: { inputTokens: usage.prompt_tokens, outputTokens: usage.completion_tokens },
      }),
    };
  }
}

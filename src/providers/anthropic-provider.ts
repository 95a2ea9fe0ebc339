import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import type { LLMProvider, LLMResult, RequestOverrides, StructuredSchema } from './llm-provider';
import {
  ANTHROPIC_TOOL_REPLY_SCHEMA,
  type AnthropicText,
  type AnthropicToolCall,
  type AnthropicToolReply,
} from '../schemas/api-schemas';
import { APIResponseError } from '../errors/validation-errors';
import { GenerationError, ValidationError, handleUnknownError } from '../errors/index';
import { log, warn } from '../output/logger';

export interface AnthropicConfig {
  apiKey: string;
  model?: string | undefined;
  maxTokens?: number | undefined;
  temperature?: number | undefined;
  debug?: boolean | undefined;
  showPrompt?: boolean | undefined;
}

export const AnthropicDefaultConfig = {
  model: 'claude-3-5-sonnet-20241022',
  maxTokens: 4096,
  temperature: 0.2,
};

export class AnthropicProvider implements LLMProvider {
  private client: Anthropic;
  private config: AnthropicConfig & { model: string; maxTokens: number; temperature: number };

  constructor(config: AnthropicConfig) {
    this.client = new Anthropic({
      apiKey: config.apiKey,
      maxRetries: 2,
    });
    this.config = {
      ...config,
      model: config.model ?? AnthropicDefaultConfig.model,
      maxTokens: config.maxTokens ?? AnthropicDefaultConfig.maxTokens,
      temperature: config.temperature ?? AnthropicDefaultConfig.temperature,
    };
  }

  get model(): string {
    return this.config.model;
  }

  /**
   * Validates Anthropic API response using schema validation
   */
  private validateResponse(response: unknown): AnthropicToolReply {
    try {
      return ANTHROPIC_TOOL_REPLY_SCHEMA.parse(response);
    } catch (e: unknown) {
      if (e instanceof z.ZodError) {
        throw new APIResponseError(
          `Invalid Anthropic API response structure: ${e.message}`,
          response,
          e
        );
      }
      const err = handleUnknownError(e, 'Anthropic response validation');
      throw new ValidationError(`Anthropic response validation failed: ${err.message}`);
    }
  }

  async runPromptStructured<T = unknown>(
    content: string,
    promptText: string,
    schema: StructuredSchema,
    overrides: RequestOverrides = {}
  ): Promise<LLMResult<T>> {
    const model = overrides.model ?? this.config.model;
    // Anthropic accepts temperatures in [0, 1] only
    const temperature = Math.min(overrides.temperature ?? this.config.temperature, 1);

    const params: Anthropic.Messages.MessageCreateParamsNonStreaming = {
      model,
      system: promptText,
      messages: [{ role: 'user', content }],
      max_tokens: this.config.maxTokens,
      temperature,
      tools: [this.convertToAnthropicToolSchema(schema)],
      tool_choice: { type: 'tool', name: schema.name },
    };

    if (this.config.debug) {
      log('[faqforge] Sending request to Anthropic:', {
        model,
        maxTokens: this.config.maxTokens,
        temperature,
      });
      if (this.config.showPrompt) {
        log('[faqforge] System prompt (full):');
        log(promptText);
        log('[faqforge] User content (full):');
        log(content);
      }
    }

    let rawResponse: unknown;
    try {
      rawResponse = await this.client.messages.create(params);
    } catch (e: unknown) {
      // Subclasses first: they all extend APIError
      if (e instanceof Anthropic.RateLimitError) {
        throw new GenerationError(`Anthropic rate limit exceeded: ${e.message}`, undefined, e);
      }
      if (e instanceof Anthropic.AuthenticationError) {
        throw new GenerationError(`Anthropic authentication failed: ${e.message}`, undefined, e);
      }
      if (e instanceof Anthropic.BadRequestError) {
        throw new GenerationError(`Anthropic bad request: ${e.message}`, undefined, e);
      }
      if (e instanceof Anthropic.APIError) {
        throw new GenerationError(`Anthropic API error (${e.status}): ${e.message}`, undefined, e);
      }

      const err = handleUnknownError(e, 'Anthropic API call');
      throw new GenerationError(`Anthropic API call failed: ${err.message}`, undefined, e);
    }

    const validatedResponse = this.validateResponse(rawResponse);
    const data = this.extractStructuredResponse<T>(validatedResponse, schema.name);

    return {
      data,
      usage: {
        inputTokens: validatedResponse.usage.input_tokens,
        outputTokens: validatedResponse.usage.output_tokens,
      },
    };
  }

  private convertToAnthropicToolSchema(schema: StructuredSchema): Anthropic.Messages.Tool {
    return {
      name: schema.name,
      description: `Submit ${schema.name} results`,
      input_schema: {
        ...schema.schema,
        type: 'object',
      },
    };
  }

  private extractStructuredResponse<T>(response: AnthropicToolReply, expectedToolName: string): T {
    if (this.config.debug) {
      log('[faqforge] LLM response meta:', {
        usage: {
          input_tokens: response.usage.input_tokens,
          output_tokens: response.usage.output_tokens,
        },
        stop_reason: response.stop_reason,
      });
    }

    if (response.stop_reason === 'max_tokens') {
      warn('Anthropic response hit the token limit; tool input may be truncated');
    }

    const blocks = response.content;
    if (blocks.length === 0) {
      throw new APIResponseError('Empty response from Anthropic API (no content blocks).', response);
    }

    const toolCalls = blocks.filter((block): block is AnthropicToolCall => block.type === 'tool_use');
    const toolBlock = toolCalls.find((block) => block.name === expectedToolName);

    if (!toolBlock) {
      if (toolCalls.length > 0) {
        const availableTools = toolCalls.map((block) => block.name);
        throw new APIResponseError(
          `Expected tool call '${expectedToolName}' but received: ${availableTools.join(', ')}`,
          response
        );
      }

      const firstText = blocks.find((block): block is AnthropicText => block.type === 'text');
      if (firstText) {
        const textContent = firstText.text.slice(0, 200);
        throw new APIResponseError(
          `No tool call received for ${expectedToolName}. Response contains text instead: ${textContent}${firstText.text.length > 200 ? '...' : ''}`,
          response
        );
      }

      throw new APIResponseError(
        `No tool call received for ${expectedToolName}. Response may not contain structured data.`,
        response
      );
    }

    const input = toolBlock.input;
    if (typeof input !== 'object' || input === null || Array.isArray(input)) {
      throw new APIResponseError(
        `Tool call for ${expectedToolName} returned invalid input type: ${input === null ? 'null' : typeof input}`,
        response
      );
    }
    if (Object.keys(input).length === 0) {
      throw new APIResponseError(`Tool call for ${expectedToolName} returned empty input.`, response);
    }

    return input as T;
  }
}

import { z } from 'zod';

/*
 * Raw SDK replies, validated down to the fields the providers read.
 * Anything else in a reply is stripped by zod.
 */

// OpenAI chat completion with a json_schema response format
export const OPENAI_COMPLETION_SCHEMA = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
        finish_reason: z.string().nullable(),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
    })
    .optional(),
});

const ANTHROPIC_TEXT_SCHEMA = z.object({
  type: z.literal('text'),
  text: z.string(),
});

const ANTHROPIC_TOOL_CALL_SCHEMA = z.object({
  type: z.literal('tool_use'),
  name: z.string(),
  input: z.unknown(),
});

// Anthropic message answering a forced tool call
export const ANTHROPIC_TOOL_REPLY_SCHEMA = z.object({
  content: z.array(z.discriminatedUnion('type', [ANTHROPIC_TEXT_SCHEMA, ANTHROPIC_TOOL_CALL_SCHEMA])),
  stop_reason: z.string().nullable(),
  usage: z.object({
    input_tokens: z.number(),
    output_tokens: z.number(),
  }),
});

export type OpenAICompletion = z.infer<typeof OPENAI_COMPLETION_SCHEMA>;
export type AnthropicToolReply = z.infer<typeof ANTHROPIC_TOOL_REPLY_SCHEMA>;
export type AnthropicText = z.infer<typeof ANTHROPIC_TEXT_SCHEMA>;
export type AnthropicToolCall = z.infer<typeof ANTHROPIC_TOOL_CALL_SCHEMA>;

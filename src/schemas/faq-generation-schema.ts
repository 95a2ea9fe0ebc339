import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

/**
 * Schema for the LLM output when generating FAQs from one chunk
 */
export const FAQ_PAIR_SCHEMA = z.object({
    question: z.string().describe('A question a reader of the excerpt would ask'),
    answer: z.string().describe('Answer based only on the excerpt'),
    evidence: z.string().optional().describe('Short verbatim passage from the excerpt supporting the answer'),
});

export const FAQ_GENERATION_SCHEMA = z.object({
    faqs: z.array(FAQ_PAIR_SCHEMA),
});

export const FAQ_GENERATION_SCHEMA_NAME = 'submit_faqs';

// The providers take a plain JSON schema object
export const FAQ_GENERATION_JSON_SCHEMA = zodToJsonSchema(FAQ_GENERATION_SCHEMA, {
    $refStrategy: 'none',
}) as Record<string, unknown>;

export type FaqPair = z.infer<typeof FAQ_PAIR_SCHEMA>;
export type FaqGenerationOutput = z.infer<typeof FAQ_GENERATION_SCHEMA>;

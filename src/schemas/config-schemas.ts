import { z } from 'zod';
import { SimilarityMetric } from '../similarity/similarity';

// ~800 tokens at four characters per token
export const DEFAULT_MAX_CHUNK_CHARS = 3200;
export const DEFAULT_OVERLAP_CHARS = 400;

export const PIPELINE_CONFIG_SCHEMA = z
  .object({
    maxChunkChars: z.number().int().positive().default(DEFAULT_MAX_CHUNK_CHARS),
    overlapChars: z.number().int().positive().default(DEFAULT_OVERLAP_CHARS),
    maxFaqsPerChunk: z.number().int().positive().default(3),
    similarityThreshold: z.number().min(0).max(1).default(0.85),
    answerMergeThreshold: z.number().min(0).max(1).default(0.9),
    maxFaqs: z.number().int().positive().optional(),
    generationConcurrency: z.number().int().positive().default(4),
    model: z.string().min(1).optional(),
    temperature: z.number().min(0).max(2).default(0.7),
    timeoutMs: z.number().int().positive().optional(),
    similarityMetric: z
      .enum([SimilarityMetric.JACCARD, SimilarityMetric.FUZZY_TOKEN_SET])
      .default(SimilarityMetric.JACCARD),
  })
  .strict()
  .refine((config) => config.overlapChars < config.maxChunkChars, {
    message: 'overlapChars must be smaller than maxChunkChars',
    path: ['overlapChars'],
  });

// FAQ_* environment variables, all optional and coerced from strings
export const PIPELINE_ENV_SCHEMA = z.object({
  FAQ_MAX_CHUNK_CHARS: z.coerce.number().optional(),
  FAQ_OVERLAP_CHARS: z.coerce.number().optional(),
  FAQ_MAX_FAQS_PER_CHUNK: z.coerce.number().optional(),
  FAQ_SIMILARITY_THRESHOLD: z.coerce.number().optional(),
  FAQ_ANSWER_MERGE_THRESHOLD: z.coerce.number().optional(),
  FAQ_MAX_FAQS: z.coerce.number().optional(),
  FAQ_CONCURRENCY: z.coerce.number().optional(),
  FAQ_MODEL: z.string().min(1).optional(),
  FAQ_TEMPERATURE: z.coerce.number().optional(),
  FAQ_TIMEOUT_MS: z.coerce.number().optional(),
  FAQ_SIMILARITY_METRIC: z.string().optional(),
});

export type PipelineConfig = z.infer<typeof PIPELINE_CONFIG_SCHEMA>;
export type PipelineConfigInput = z.input<typeof PIPELINE_CONFIG_SCHEMA>;
export type PipelineEnv = z.infer<typeof PIPELINE_ENV_SCHEMA>;

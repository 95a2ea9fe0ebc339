import { z } from 'zod';
import {
  PIPELINE_CONFIG_SCHEMA,
  PIPELINE_ENV_SCHEMA,
  type PipelineConfig,
  type PipelineConfigInput,
  type PipelineEnv,
} from '../schemas/config-schemas';
import { ConfigError, handleUnknownError } from '../errors/index';

function formatConfigIssues(zodError: z.ZodError): string {
  return zodError.issues
    .map((issue) => {
      const field = issue.path.join('.');
      return field ? `${field}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Validate pipeline settings and fill in defaults.
 * @throws {ConfigError} when any setting is out of range or unknown
 */
export function parsePipelineConfig(input: unknown = {}): PipelineConfig {
  try {
    return PIPELINE_CONFIG_SCHEMA.parse(input);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ConfigError(`Invalid pipeline configuration: ${formatConfigIssues(e)}`);
    }
    const err = handleUnknownError(e, 'Pipeline configuration');
    throw new ConfigError(`Pipeline configuration failed: ${err.message}`);
  }
}

function configFromEnv(env: PipelineEnv): PipelineConfigInput {
  return {
    ...(env.FAQ_MAX_CHUNK_CHARS !== undefined && { maxChunkChars: env.FAQ_MAX_CHUNK_CHARS }),
    ...(env.FAQ_OVERLAP_CHARS !== undefined && { overlapChars: env.FAQ_OVERLAP_CHARS }),
    ...(env.FAQ_MAX_FAQS_PER_CHUNK !== undefined && { maxFaqsPerChunk: env.FAQ_MAX_FAQS_PER_CHUNK }),
    ...(env.FAQ_SIMILARITY_THRESHOLD !== undefined && { similarityThreshold: env.FAQ_SIMILARITY_THRESHOLD }),
    ...(env.FAQ_ANSWER_MERGE_THRESHOLD !== undefined && { answerMergeThreshold: env.FAQ_ANSWER_MERGE_THRESHOLD }),
    ...(env.FAQ_MAX_FAQS !== undefined && { maxFaqs: env.FAQ_MAX_FAQS }),
    ...(env.FAQ_CONCURRENCY !== undefined && { generationConcurrency: env.FAQ_CONCURRENCY }),
    ...(env.FAQ_MODEL !== undefined && { model: env.FAQ_MODEL }),
    ...(env.FAQ_TEMPERATURE !== undefined && { temperature: env.FAQ_TEMPERATURE }),
    ...(env.FAQ_TIMEOUT_MS !== undefined && { timeoutMs: env.FAQ_TIMEOUT_MS }),
  };
}

/**
 * Resolve pipeline settings from explicit overrides layered over FAQ_* environment variables.
 */
export function loadPipelineConfig(
  overrides: Record<string, unknown> = {},
  env: Record<string, string | undefined> = process.env
): PipelineConfig {
  const envResult = PIPELINE_ENV_SCHEMA.safeParse(env);
  if (!envResult.success) {
    throw new ConfigError(`Invalid FAQ_* environment variables: ${formatConfigIssues(envResult.error)}`);
  }

  const fromEnv = configFromEnv(envResult.data);
  const metric = envResult.data.FAQ_SIMILARITY_METRIC;

  return parsePipelineConfig({
    ...fromEnv,
    ...(metric !== undefined && { similarityMetric: metric }),
    ...overrides,
  });
}

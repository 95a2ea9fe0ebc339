// Document
export { createDocument, normalizeText, type Document } from './document/document';

// Chunking
export { ParagraphChunker, chunkText, validateChunkingOptions } from './chunking/chunker';
export { getChunkStatistics } from './chunking/statistics';
export type {
  Chunk,
  ChunkBoundary,
  ChunkingOptions,
  ChunkingStrategy,
  ChunkStatistics,
} from './chunking/types';

// Generation
export type { CharSpan, GenerationAdapter, GenerationParams, RawCandidate } from './generation/types';
export { LLMGenerationAdapter, type LLMGenerationAdapterOptions } from './generation/llm-generation-adapter';
export { FaqRequestBuilder, type FaqRequest, type FaqRequestBuilderOptions, type RequestBuilder } from './generation/request-builder';
export { parseGenerationResponse, parseQuestionAnswerText } from './generation/response-parser';
export { locateEvidence, type EvidenceMatch, type EvidenceStrategy } from './locate/evidence-locator';
export { TemplateRenderer, FAQ_GENERATION_TEMPLATE, type TemplateContext } from './prompts/template-renderer';
export {
  FAQ_GENERATION_SCHEMA,
  FAQ_GENERATION_JSON_SCHEMA,
  FAQ_GENERATION_SCHEMA_NAME,
  type FaqPair,
  type FaqGenerationOutput,
} from './schemas/faq-generation-schema';

// Providers
export type { LLMProvider, LLMResult, RequestOverrides, StructuredSchema } from './providers/llm-provider';
export { OpenAIProvider, OpenAIDefaultConfig, type OpenAIConfig } from './providers/openai-provider';
export { AnthropicProvider, AnthropicDefaultConfig, type AnthropicConfig } from './providers/anthropic-provider';
export { createProvider, ProviderType, type ProviderOptions } from './providers/provider-factory';

// Collection
export { collectCandidates, attachProvenance } from './collector/candidate-collector';
export type {
  ChunkFailure,
  ChunkFailureKind,
  ChunkProgress,
  CollectionOptions,
  CollectionResult,
  RunSummary,
} from './collector/types';

// Quality
export {
  DEFAULT_QUALITY_POLICY,
  filterCandidates,
  findRejectionReason,
  isAccepted,
  resolveQualityPolicy,
} from './quality/quality-filter';
export { calculateQualityScore } from './quality/scoring';
export {
  RejectionReason,
  type QualityPolicy,
  type QualityWeights,
  type RejectionReasonName,
  type ScoredCandidate,
} from './quality/types';

// Merging
export { calculateConfidence, clusterCandidates, mergeCandidates } from './merging/merger';
export type { FAQCluster, FAQEntry, MergeOptions } from './merging/types';

// Similarity
export {
  SimilarityMetric,
  JaccardSimilarity,
  FuzzyTokenSetSimilarity,
  createSimilarityStrategy,
  type SimilarityMetricName,
  type SimilarityStrategy,
} from './similarity/similarity';
export { normalizeTokens, jaccard } from './similarity/tokens';

// Pipeline
export { FaqPipeline } from './pipeline/faq-pipeline';
export {
  PipelineStatus,
  type FaqPipelineOptions,
  type PipelineResult,
  type PipelineStatusName,
  type PipelineSummary,
  type RunOptions,
} from './pipeline/types';

// Configuration
export { parsePipelineConfig, loadPipelineConfig } from './boundaries/config-loader';
export { parseEnvironment, pricingFromEnvironment } from './boundaries/env-parser';
export {
  PIPELINE_CONFIG_SCHEMA,
  type PipelineConfig,
  type PipelineConfigInput,
} from './schemas/config-schemas';
export type { EnvConfig } from './schemas/env-schemas';

// Errors
export {
  FaqforgeError,
  ValidationError,
  ConfigError,
  GenerationError,
  ParseError,
  EmptyDocumentError,
  CancellationError,
  handleUnknownError,
} from './errors/index';
export { APIResponseError, isAPIResponseError } from './errors/validation-errors';

// Output
export { setSilentMode, setVerboseMode, log, debug, warn, error } from './output/logger';
export { printRunSummary, printTokenUsage, printFailureRow } from './output/reporter';

// Token usage
export { calculateCost, TokenUsageTracker } from './types/token-usage';
export type { TokenUsage, TokenUsageStats, PricingConfig } from './types/token-usage';

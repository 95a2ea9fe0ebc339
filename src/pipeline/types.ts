import type { Chunk, ChunkStatistics } from '../chunking/types';
import type { RunSummary, ChunkProgress } from '../collector/types';
import type { EmptyDocumentError } from '../errors/index';
import type { FAQEntry } from '../merging/types';
import type { QualityPolicy, RejectionReasonName, ScoredCandidate } from '../quality/types';
import type { PipelineConfigInput } from '../schemas/config-schemas';
import type { GenerationAdapter } from '../generation/types';
import type { SimilarityStrategy } from '../similarity/similarity';
import type { TokenUsageStats } from '../types/token-usage';

export const PipelineStatus = {
  COMPLETED: 'completed',
  PARTIAL: 'partial',
  EMPTY: 'empty',
} as const;

export type PipelineStatusName = typeof PipelineStatus[keyof typeof PipelineStatus];

export interface FaqPipelineOptions {
  adapter: GenerationAdapter;
  config?: PipelineConfigInput;
  // Overrides the strategy named by config.similarityMetric
  similarity?: SimilarityStrategy;
  qualityPolicy?: Partial<QualityPolicy>;
}

export interface RunOptions {
  signal?: AbortSignal | undefined;
  onChunkComplete?: ((progress: ChunkProgress) => void) | undefined;
}

export interface PipelineSummary {
  source: string;
  chunking: ChunkStatistics;
  run: RunSummary;
  candidates: number;
  accepted: number;
  rejectedByReason: Partial<Record<RejectionReasonName, number>>;
  clusters: number;
  entries: number;
  tokenUsage?: TokenUsageStats;
}

interface PipelineResultBase {
  chunks: Chunk[];
  entries: FAQEntry[];
  rejected: ScoredCandidate[];
  summary: PipelineSummary;
}

export interface CompletedPipelineResult extends PipelineResultBase {
  status: typeof PipelineStatus.COMPLETED;
}

// Cancelled or timed out; entries come from the chunks that finished
export interface PartialPipelineResult extends PipelineResultBase {
  status: typeof PipelineStatus.PARTIAL;
}

export interface EmptyPipelineResult extends PipelineResultBase {
  status: typeof PipelineStatus.EMPTY;
  error: EmptyDocumentError;
}

export type PipelineResult = CompletedPipelineResult | PartialPipelineResult | EmptyPipelineResult;

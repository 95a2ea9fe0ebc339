import type { Document } from '../document/document';
import { chunkText } from '../chunking/chunker';
import { getChunkStatistics } from '../chunking/statistics';
import { collectCandidates } from '../collector/candidate-collector';
import type { RunSummary } from '../collector/types';
import { EmptyDocumentError } from '../errors/index';
import type { GenerationAdapter, GenerationParams } from '../generation/types';
import { mergeCandidates } from '../merging/merger';
import { filterCandidates, isAccepted, resolveQualityPolicy } from '../quality/quality-filter';
import type { QualityPolicy, RejectionReasonName, ScoredCandidate } from '../quality/types';
import { parsePipelineConfig } from '../boundaries/config-loader';
import type { PipelineConfig } from '../schemas/config-schemas';
import { createSimilarityStrategy, type SimilarityStrategy } from '../similarity/similarity';
import { debug, warn } from '../output/logger';
import {
  PipelineStatus,
  type FaqPipelineOptions,
  type PipelineResult,
  type PipelineSummary,
  type RunOptions,
} from './types';

function countRejections(scored: readonly ScoredCandidate[]): Partial<Record<RejectionReasonName, number>> {
  const counts: Partial<Record<RejectionReasonName, number>> = {};
  for (const candidate of scored) {
    if (candidate.rejectedReason !== undefined) {
      counts[candidate.rejectedReason] = (counts[candidate.rejectedReason] ?? 0) + 1;
    }
  }
  return counts;
}

function emptyRunSummary(): RunSummary {
  return {
    totalChunks: 0,
    chunksAttempted: 0,
    chunksSucceeded: 0,
    chunksFailed: 0,
    chunksCancelled: 0,
    candidatesCollected: 0,
    failures: [],
    cancelled: false,
  };
}

/**
 * Document in, ranked FAQ entries out: chunk, generate per chunk, filter, merge.
 * Configuration is validated when the pipeline is built, so a bad setting
 * fails before any model call.
 */
export class FaqPipeline {
  readonly config: PipelineConfig;
  private readonly adapter: GenerationAdapter;
  private readonly similarity: SimilarityStrategy;
  private readonly qualityPolicy: QualityPolicy;

  constructor(options: FaqPipelineOptions) {
    this.config = parsePipelineConfig(options.config ?? {});
    this.adapter = options.adapter;
    this.similarity = options.similarity ?? createSimilarityStrategy(this.config.similarityMetric);
    this.qualityPolicy = resolveQualityPolicy(options.qualityPolicy);
  }

  async run(document: Document, options: RunOptions = {}): Promise<PipelineResult> {
    const { config } = this;
    const chunks = chunkText(document.text, config.maxChunkChars, config.overlapChars);
    const chunking = getChunkStatistics(chunks);

    if (chunks.length === 0) {
      debug(`${document.source}: nothing to chunk`);
      return {
        status: PipelineStatus.EMPTY,
        error: new EmptyDocumentError(document.source),
        chunks,
        entries: [],
        rejected: [],
        summary: this.summarize(document.source, chunking, emptyRunSummary(), [], 0, 0),
      };
    }
    if (chunking.hardSplits > 0) {
      warn(`${document.source}: ${chunking.hardSplits} chunk(s) had to be cut mid-sentence`);
    }

    const params: GenerationParams = {
      maxFaqsPerChunk: config.maxFaqsPerChunk,
      model: config.model ?? this.adapter.defaultModel,
      temperature: config.temperature,
    };

    debug(`${document.source}: ${chunks.length} chunk(s), model ${params.model}`);
    const collection = await collectCandidates(chunks, this.adapter, params, {
      concurrency: config.generationConcurrency,
      signal: options.signal,
      timeoutMs: config.timeoutMs,
      onChunkComplete: options.onChunkComplete,
    });

    const scored = filterCandidates(collection.candidates, this.qualityPolicy);
    const ranked = mergeCandidates(scored, {
      similarityThreshold: config.similarityThreshold,
      answerMergeThreshold: config.answerMergeThreshold,
      similarity: this.similarity,
    });
    const entries = config.maxFaqs !== undefined ? ranked.slice(0, config.maxFaqs) : ranked;

    return {
      status: collection.summary.cancelled ? PipelineStatus.PARTIAL : PipelineStatus.COMPLETED,
      chunks,
      entries,
      rejected: scored.filter((candidate) => !isAccepted(candidate)),
      summary: this.summarize(
        document.source,
        chunking,
        collection.summary,
        scored,
        ranked.length,
        entries.length
      ),
    };
  }

  private summarize(
    source: string,
    chunking: PipelineSummary['chunking'],
    run: RunSummary,
    scored: readonly ScoredCandidate[],
    clusters: number,
    entries: number
  ): PipelineSummary {
    const tokenUsage = this.adapter.usage?.();
    return {
      source,
      chunking,
      run,
      candidates: scored.length,
      accepted: scored.filter(isAccepted).length,
      rejectedByReason: countRejections(scored),
      clusters,
      entries,
      ...(tokenUsage !== undefined && { tokenUsage }),
    };
  }
}

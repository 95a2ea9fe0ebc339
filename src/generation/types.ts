import type { Chunk } from '../chunking/types';
import type { TokenUsageStats } from '../types/token-usage';

/** Character span in the source document: [start, end). */
export type CharSpan = readonly [number, number];

export interface RawCandidate {
  question: string;
  answer: string;
  sourceChunkIndex: number;
  charSpan: CharSpan;
}

export interface GenerationParams {
  maxFaqsPerChunk: number;
  model: string;
  temperature: number;
}

/*
 * Contract around the model call. One call per chunk; a rejected promise
 * (GenerationError or ParseError) costs that chunk its candidates, nothing more.
 */
export interface GenerationAdapter {
  // Model used when the pipeline configuration names none
  readonly defaultModel: string;
  generate(chunk: Chunk, params: GenerationParams): Promise<RawCandidate[]>;
  // Accumulated token usage across calls, for adapters that can report it
  usage?(): TokenUsageStats;
}

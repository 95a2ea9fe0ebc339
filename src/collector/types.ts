import type { RawCandidate } from '../generation/types';

export type ChunkFailureKind = 'GenerationError' | 'ParseError' | 'Cancelled';

export interface ChunkFailure {
  chunkIndex: number;
  kind: ChunkFailureKind;
  message: string;
}

export interface RunSummary {
  totalChunks: number;
  chunksAttempted: number;
  chunksSucceeded: number;
  chunksFailed: number;
  chunksCancelled: number;
  candidatesCollected: number;
  failures: ChunkFailure[];
  cancelled: boolean;
}

export interface ChunkProgress {
  chunkIndex: number;
  completed: number;
  total: number;
  ok: boolean;
}

export interface CollectionOptions {
  concurrency: number;
  signal?: AbortSignal | undefined;
  timeoutMs?: number | undefined;
  onChunkComplete?: ((progress: ChunkProgress) => void) | undefined;
}

export interface CollectionResult {
  candidates: RawCandidate[]; // Chunk-index order, whatever order calls finished in
  summary: RunSummary;
}

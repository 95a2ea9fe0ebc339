/**
 * How the end of a chunk was chosen. `hard` marks a last-resort split at the
 * character limit, inside a sentence.
 */
export type ChunkBoundary = 'paragraph' | 'sentence' | 'hard';

export interface Chunk {
  index: number;
  text: string; // Overlap prefix followed by the chunk's own content
  startOffset: number; // Offsets of the new (non-overlap) content in the document
  endOffset: number;
  overlapWithPrev: number;
  boundary: ChunkBoundary;
}

export interface ChunkingOptions {
  maxChunkChars: number; // Upper bound on chunk.text, overlap included
  overlapChars: number; // Trailing context carried into the next chunk
}

export interface ChunkingStrategy {
  readonly name: string;
  chunk(content: string, options: ChunkingOptions): Chunk[];
}

export interface ChunkStatistics {
  totalChunks: number;
  totalChars: number;
  avgChars: number;
  minChars: number;
  maxChars: number;
  overlapChars: number;
  hardSplits: number;
}

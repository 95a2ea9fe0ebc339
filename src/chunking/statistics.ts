import type { Chunk, ChunkStatistics } from './types';

export function getChunkStatistics(chunks: readonly Chunk[]): ChunkStatistics {
  if (chunks.length === 0) {
    return {
      totalChunks: 0,
      totalChars: 0,
      avgChars: 0,
      minChars: 0,
      maxChars: 0,
      overlapChars: 0,
      hardSplits: 0,
    };
  }

  const sizes = chunks.map((c) => c.text.length);
  const totalChars = sizes.reduce((a, b) => a + b, 0);

  return {
    totalChunks: chunks.length,
    totalChars,
    avgChars: Number((totalChars / chunks.length).toFixed(2)),
    minChars: Math.min(...sizes),
    maxChars: Math.max(...sizes),
    overlapChars: chunks.reduce((sum, c) => sum + c.overlapWithPrev, 0),
    hardSplits: chunks.filter((c) => c.boundary === 'hard').length,
  };
}

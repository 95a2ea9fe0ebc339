import { describe, it, expect } from 'vitest';
import { chunkText } from '../src/chunking/chunker';
import { getChunkStatistics } from '../src/chunking/statistics';

describe('getChunkStatistics', () => {
  it('summarizes chunk sizes, overlap and hard splits', () => {
    const chunks = chunkText('One two three. Four five six. Seven eight nine.', 20, 5);

    expect(getChunkStatistics(chunks)).toEqual({
      totalChunks: 4,
      totalChars: 62,
      avgChars: 15.5,
      minChars: 7,
      maxChars: 20,
      overlapChars: 15,
      hardSplits: 1,
    });
  });

  it('returns zeros for no chunks', () => {
    expect(getChunkStatistics([])).toEqual({
      totalChunks: 0,
      totalChars: 0,
      avgChars: 0,
      minChars: 0,
      maxChars: 0,
      overlapChars: 0,
      hardSplits: 0,
    });
  });
});

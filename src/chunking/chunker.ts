import { ConfigError } from '../errors/index';
import type { Chunk, ChunkBoundary, ChunkingOptions, ChunkingStrategy } from './types';
import { findParagraphStarts, findSentenceCut, splitsSurrogatePair } from './utils';

interface Span {
  start: number;
  end: number;
  boundary: ChunkBoundary;
}

export function validateChunkingOptions(options: ChunkingOptions): void {
  const { maxChunkChars, overlapChars } = options;
  if (!Number.isInteger(maxChunkChars) || !Number.isInteger(overlapChars)) {
    throw new ConfigError(
      `maxChunkChars and overlapChars must be integers (got ${maxChunkChars}, ${overlapChars})`
    );
  }
  if (overlapChars <= 0 || overlapChars >= maxChunkChars) {
    throw new ConfigError(
      `Chunk overlap must satisfy 0 < overlapChars < maxChunkChars (got overlapChars=${overlapChars}, maxChunkChars=${maxChunkChars})`
    );
  }
}

/*
 * Paragraph-first chunker. Paragraphs are packed into a chunk until the next
 * one would overflow the window; an oversized paragraph falls back to sentence
 * boundaries and, failing that, to a hard split at the limit.
 *
 * Every chunk after the first is prefixed with the trailing `overlapChars`
 * characters that precede its content. Chunks are contiguous, so that prefix is
 * exactly the tail of the previous chunk's raw text. The budget for new content
 * is the window minus that prefix. Neither a hard split nor the overlap prefix
 * separates a surrogate pair, so a boundary may land one unit early.
 */
export class ParagraphChunker implements ChunkingStrategy {
  readonly name = 'paragraph';

  chunk(content: string, options: ChunkingOptions): Chunk[] {
    validateChunkingOptions(options);
    if (content.trim().length === 0) return [];

    const spans = this.planSpans(content, options);

    return spans.map((span, index) => {
      let overlap = index === 0 ? 0 : Math.min(options.overlapChars, span.start);
      if (overlap > 0 && splitsSurrogatePair(content, span.start - overlap)) overlap -= 1;
      return {
        index,
        text: content.slice(span.start - overlap, span.end),
        startOffset: span.start,
        endOffset: span.end,
        overlapWithPrev: overlap,
        boundary: span.boundary,
      };
    });
  }

  private planSpans(text: string, { maxChunkChars, overlapChars }: ChunkingOptions): Span[] {
    const budgetAt = (start: number): number => maxChunkChars - Math.min(overlapChars, start);
    const starts = findParagraphStarts(text);
    const spans: Span[] = [];

    let chunkStart = 0;
    let chunkEnd = 0;

    for (let i = 0; i < starts.length; i++) {
      const paraStart = starts[i] ?? 0;
      const paraEnd = starts[i + 1] ?? text.length;

      if (chunkEnd > chunkStart) {
        if (paraEnd - chunkStart <= budgetAt(chunkStart)) {
          chunkEnd = paraEnd;
          continue;
        }
        spans.push({ start: chunkStart, end: chunkEnd, boundary: 'paragraph' });
        chunkStart = chunkEnd;
      }

      // Oversized paragraph: emit full-budget pieces, keep the remainder open
      let pos = paraStart;
      while (paraEnd - pos > budgetAt(pos)) {
        const limit = pos + budgetAt(pos);
        const cut = findSentenceCut(text, pos, limit);
        if (cut > pos) {
          spans.push({ start: pos, end: cut, boundary: 'sentence' });
          pos = cut;
        } else {
          const end = this.hardCut(text, pos, limit);
          spans.push({ start: pos, end, boundary: 'hard' });
          pos = end;
        }
      }

      chunkStart = pos;
      chunkEnd = paraEnd;
    }

    if (chunkEnd > chunkStart) {
      spans.push({ start: chunkStart, end: chunkEnd, boundary: 'paragraph' });
    }

    return spans;
  }

  // Back off one unit rather than split a surrogate pair, unless that leaves nothing
  private hardCut(text: string, pos: number, limit: number): number {
    if (!splitsSurrogatePair(text, limit)) return limit;
    return limit - 1 > pos ? limit - 1 : limit + 1;
  }
}

const DEFAULT_CHUNKER = new ParagraphChunker();

/**
 * Splits `text` into overlapping, offset-tracked chunks. Pure: the same input
 * and parameters always yield the same chunks.
 */
export function chunkText(text: string, maxChunkChars: number, overlapChars: number): Chunk[] {
  return DEFAULT_CHUNKER.chunk(text, { maxChunkChars, overlapChars });
}

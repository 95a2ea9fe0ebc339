import { describe, it, expect } from 'vitest';
import { ParagraphChunker, chunkText } from '../src/chunking/chunker';
import { findParagraphStarts, findSentenceCut, splitsSurrogatePair } from '../src/chunking/utils';
import { ConfigError } from '../src/errors/index';
import type { Chunk } from '../src/chunking/types';

const SENTENCES = 'One two three. Four five six. Seven eight nine.';

function expectChunkInvariants(doc: string, chunks: Chunk[], maxChunkChars: number, overlapChars: number) {
  let expectedStart = 0;
  chunks.forEach((chunk, i) => {
    expect(chunk.index).toBe(i);
    expect(chunk.startOffset).toBe(expectedStart);
    expect(chunk.endOffset).toBeGreaterThan(chunk.startOffset);
    expect(chunk.overlapWithPrev).toBe(i === 0 ? 0 : Math.min(overlapChars, chunk.startOffset));
    expect(chunk.text).toBe(doc.slice(chunk.startOffset - chunk.overlapWithPrev, chunk.endOffset));
    expect(chunk.text.length).toBeLessThanOrEqual(maxChunkChars);
    expectedStart = chunk.endOffset;
  });
  expect(expectedStart).toBe(doc.length);
}

describe('findParagraphStarts', () => {
  it('starts paragraphs after blank lines', () => {
    expect(findParagraphStarts('Alpha one.\n\nBeta two.\n\nGamma three.')).toEqual([0, 12, 23]);
  });

  it('starts a paragraph at every heading line', () => {
    expect(findParagraphStarts('Intro line.\n# Title\nBody text.')).toEqual([0, 12]);
  });

  it('does not treat a hash inside a word as a heading', () => {
    expect(findParagraphStarts('Use C#\nfor this.')).toEqual([0]);
  });
});

describe('findSentenceCut', () => {
  it('cuts after the last terminator and its whitespace', () => {
    expect(findSentenceCut(SENTENCES, 0, 20)).toBe(15);
  });

  it('returns -1 when the window holds no sentence end', () => {
    expect(findSentenceCut(SENTENCES, 30, 45)).toBe(-1);
  });

  it('ignores a terminator at the window edge unless whitespace follows', () => {
    expect(findSentenceCut('Version 2.5 is out', 0, 10)).toBe(-1);
    expect(findSentenceCut('Done. Next', 0, 5)).toBe(5);
  });
});

describe('splitsSurrogatePair', () => {
  it('detects a position inside an astral character', () => {
    const text = 'a\u{1F600}b';
    expect(splitsSurrogatePair(text, 1)).toBe(false);
    expect(splitsSurrogatePair(text, 2)).toBe(true);
    expect(splitsSurrogatePair(text, 3)).toBe(false);
  });

  it('is false at the text edges', () => {
    expect(splitsSurrogatePair('\u{1F600}', 0)).toBe(false);
    expect(splitsSurrogatePair('\u{1F600}', 2)).toBe(false);
  });
});

describe('ParagraphChunker', () => {
  it('returns no chunks for empty or whitespace-only text', () => {
    expect(chunkText('', 100, 10)).toEqual([]);
    expect(chunkText(' \n\n\t ', 100, 10)).toEqual([]);
  });

  it('keeps short text in a single chunk without overlap', () => {
    expect(chunkText('Hello world.', 100, 10)).toEqual([
      { index: 0, text: 'Hello world.', startOffset: 0, endOffset: 12, overlapWithPrev: 0, boundary: 'paragraph' },
    ]);
  });

  it('packs paragraphs and prefixes the next chunk with overlap', () => {
    const doc = 'Alpha one.\n\nBeta two.\n\nGamma three.';
    const chunks = chunkText(doc, 25, 5);

    expect(chunks).toEqual([
      {
        index: 0,
        text: 'Alpha one.\n\nBeta two.\n\n',
        startOffset: 0,
        endOffset: 23,
        overlapWithPrev: 0,
        boundary: 'paragraph',
      },
      {
        index: 1,
        text: 'wo.\n\nGamma three.',
        startOffset: 23,
        endOffset: 35,
        overlapWithPrev: 5,
        boundary: 'paragraph',
      },
    ]);
  });

  it('splits two 300-character paragraphs into two chunks with a 50-character overlap', () => {
    const first = `${'a'.repeat(299)}.`;
    const second = `${'b'.repeat(299)}.`;
    const doc = `${first}\n\n${second}`;

    const chunks = chunkText(doc, 400, 50);

    expect(chunks).toHaveLength(2);
    expect(chunks[1]).toMatchObject({ startOffset: 302, endOffset: 602, overlapWithPrev: 50 });
    expect(chunks[1]?.text).toBe(`${'a'.repeat(47)}.\n\n${second}`);
    expect(chunks[1]?.text.slice(50)).toBe(second);
    expectChunkInvariants(doc, chunks, 400, 50);
  });

  it('splits an oversized paragraph at sentences, then hard at the limit', () => {
    const chunks = chunkText(SENTENCES, 20, 5);

    expect(chunks.map((c) => [c.startOffset, c.endOffset, c.boundary])).toEqual([
      [0, 15, 'sentence'],
      [15, 30, 'sentence'],
      [30, 45, 'hard'],
      [45, 47, 'paragraph'],
    ]);
    expect(chunks.map((c) => c.text)).toEqual([
      'One two three. ',
      'ree. Four five six. ',
      'six. Seven eight nin',
      't nine.',
    ]);
    expectChunkInvariants(SENTENCES, chunks, 20, 5);
  });

  it('breaks before a heading', () => {
    const doc = 'Intro line.\n# Title\nBody text.';
    const chunks = chunkText(doc, 24, 4);

    expect(chunks.map((c) => [c.startOffset, c.endOffset])).toEqual([
      [0, 12],
      [12, 30],
    ]);
    expect(chunks[1]?.text).toBe('ne.\n# Title\nBody text.');
  });

  it('tiles a long document with no gaps and bounded windows', () => {
    const paragraph = (n: number) =>
      `Section ${n} explains step ${n}. It lists the inputs for step ${n}. Then it gives the expected output.`;
    const doc = Array.from({ length: 12 }, (_, n) => paragraph(n)).join('\n\n');

    const chunks = chunkText(doc, 250, 60);

    expect(chunks.length).toBeGreaterThan(1);
    expectChunkInvariants(doc, chunks, 250, 60);
  });

  it('never splits a surrogate pair at a hard split or an overlap prefix', () => {
    const doc = '\u{1F600}'.repeat(30);
    const chunks = chunkText(doc, 11, 3);
    const loneSurrogate = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

    expect(chunks.map((c) => [c.startOffset, c.endOffset, c.boundary])).toEqual([
      [0, 10, 'hard'],
      [10, 18, 'hard'],
      [18, 26, 'hard'],
      [26, 34, 'hard'],
      [34, 42, 'hard'],
      [42, 50, 'hard'],
      [50, 58, 'hard'],
      [58, 60, 'paragraph'],
    ]);
    chunks.forEach((chunk, i) => {
      expect(chunk.overlapWithPrev).toBe(i === 0 ? 0 : 2);
      expect(chunk.text).toBe(doc.slice(chunk.startOffset - chunk.overlapWithPrev, chunk.endOffset));
      expect(chunk.text.length).toBeLessThanOrEqual(11);
      expect(loneSurrogate.test(chunk.text)).toBe(false);
    });
  });

  it('reproduces the same boundaries when a chunk is repeated and re-chunked', () => {
    const doc = 'Cats sleep a lot.\n\nDogs bark loudly.\n\nBirds sing at dawn.\n\n';
    const chunks = chunkText(doc, 30, 5);

    expect(chunks.map((c) => [c.startOffset, c.endOffset])).toEqual([
      [0, 19],
      [19, 38],
      [38, 59],
    ]);
    for (const chunk of chunks) {
      const piece = doc.slice(chunk.startOffset, chunk.endOffset);
      const doubled = piece + piece;
      const again = chunkText(doubled, 30, 5);

      expect(again.map((c) => [c.startOffset, c.endOffset])).toEqual([
        [0, piece.length],
        [piece.length, doubled.length],
      ]);
      expect(again.map((c) => doubled.slice(c.startOffset, c.endOffset))).toEqual([piece, piece]);
      expectChunkInvariants(doubled, again, 30, 5);
    }
  });

  it('is deterministic', () => {
    const doc = 'First paragraph here.\n\nSecond paragraph here.\n\nThird one.';
    expect(chunkText(doc, 30, 8)).toEqual(chunkText(doc, 30, 8));
  });

  it.each([
    [100, 0],
    [100, 100],
    [100, 150],
    [100.5, 10],
    [100, 2.5],
  ])('rejects maxChunkChars=%d with overlapChars=%d', (maxChunkChars, overlapChars) => {
    expect(() => new ParagraphChunker().chunk('Some text.', { maxChunkChars, overlapChars })).toThrow(ConfigError);
  });
});

import { partial_ratio, ratio, token_sort_ratio } from 'fuzzball';
import type { Chunk } from '../chunking/types';
import type { CharSpan } from '../generation/types';

export type EvidenceStrategy = 'exact' | 'case-insensitive' | 'fuzzy-line' | 'fuzzy-window';

export interface EvidenceMatch {
  charSpan: CharSpan; // Document offsets
  confidence: number; // 0-100
  strategy: EvidenceStrategy;
}

interface FuzzyMatch {
  index: number;
  length: number;
  confidence: number;
}

const DEFAULT_MIN_CONFIDENCE = 80;
// Shorter quotes match too many windows to be useful
const MIN_FUZZY_QUOTE_LENGTH = 12;
// Longer quotes are only matched against whole lines and sentences
const MAX_WINDOW_QUOTE_LENGTH = 160;
const MAX_WINDOW_TRIALS = 240;

// A line or sentence, with its terminator
const SEGMENT = /[^\n.!?]+[.!?]*/g;

/**
 * Find the line or sentence closest to the quote as a whole.
 */
function findBestSegmentMatch(quote: string, text: string, minConfidence: number): FuzzyMatch | null {
  let best: FuzzyMatch | null = null;

  for (const match of text.matchAll(SEGMENT)) {
    const raw = match[0];
    const segment = raw.trim();
    if (!segment) continue;

    const score = Math.max(ratio(quote, segment), token_sort_ratio(quote, segment));
    if (score >= minConfidence && (!best || score > best.confidence)) {
      const lead = raw.length - raw.trimStart().length;
      best = { index: (match.index ?? 0) + lead, length: segment.length, confidence: score };
    }
  }
  return best;
}

/**
 * Find best fuzzy match using a sliding window 50% smaller to 50% larger than the quote.
 * The stride widens on long chunks so at most about MAX_WINDOW_TRIALS windows are scored.
 */
function findBestWindowMatch(quote: string, text: string, minConfidence: number): FuzzyMatch | null {
  const minWindow = Math.max(1, Math.floor(quote.length * 0.5));
  const maxWindow = Math.min(text.length, Math.floor(quote.length * 1.5));
  if (maxWindow < minWindow) return null;

  const sizeCount = Math.floor((maxWindow - minWindow) / 10) + 1;
  const stride = Math.max(5, Math.ceil((text.length * sizeCount) / MAX_WINDOW_TRIALS));

  let best: FuzzyMatch | null = null;
  for (let windowSize = minWindow; windowSize <= maxWindow; windowSize += 10) {
    for (let i = 0; i <= text.length - windowSize; i += stride) {
      const window = text.substring(i, i + windowSize);
      const score = Math.max(partial_ratio(quote, window), token_sort_ratio(quote, window));
      if (score >= minConfidence && (!best || score > best.confidence)) {
        best = { index: i, length: windowSize, confidence: score };
      }
    }
  }
  return best;
}

/**
 * Index of `needle` in `text` ignoring case, or -1. Also -1 when lowercasing
 * changes the length of either string (e.g. "İ"), since lowercase offsets
 * would no longer line up with the original text.
 */
function indexOfIgnoringCase(text: string, needle: string): number {
  const lowerText = text.toLowerCase();
  const lowerNeedle = needle.toLowerCase();
  if (lowerText.length !== text.length || lowerNeedle.length !== needle.length) return -1;
  return lowerText.indexOf(lowerNeedle);
}

/**
 * Locates a quoted passage inside a chunk and maps it to document offsets.
 *
 * Exact match first, then case-insensitive, then the closest line or
 * sentence, then a bounded fuzzy sliding window for quotes the model
 * paraphrased across a sentence boundary. Returns null when nothing
 * reaches `minConfidence`.
 */
export function locateEvidence(
  chunk: Chunk,
  quote: string,
  minConfidence: number = DEFAULT_MIN_CONFIDENCE
): EvidenceMatch | null {
  const needle = quote.trim();
  if (!needle) return null;

  const text = chunk.text;
  const windowStart = chunk.startOffset - chunk.overlapWithPrev;
  const toSpan = (index: number, length: number): CharSpan => [
    windowStart + index,
    windowStart + Math.min(index + length, text.length),
  ];

  const exactIdx = text.indexOf(needle);
  if (exactIdx !== -1) {
    return { charSpan: toSpan(exactIdx, needle.length), confidence: 100, strategy: 'exact' };
  }

  const caseInsensitiveIdx = indexOfIgnoringCase(text, needle);
  if (caseInsensitiveIdx !== -1) {
    return {
      charSpan: toSpan(caseInsensitiveIdx, needle.length),
      confidence: 95,
      strategy: 'case-insensitive',
    };
  }

  if (needle.length < MIN_FUZZY_QUOTE_LENGTH) return null;

  const segmentMatch = findBestSegmentMatch(needle, text, minConfidence);
  if (segmentMatch) {
    return {
      charSpan: toSpan(segmentMatch.index, segmentMatch.length),
      confidence: segmentMatch.confidence,
      strategy: 'fuzzy-line',
    };
  }

  if (needle.length > MAX_WINDOW_QUOTE_LENGTH) return null;

  const windowMatch = findBestWindowMatch(needle, text, minConfidence);
  if (windowMatch) {
    return {
      charSpan: toSpan(windowMatch.index, windowMatch.length),
      confidence: windowMatch.confidence,
      strategy: 'fuzzy-window',
    };
  }

  return null;
}

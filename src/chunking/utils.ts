const BLANK_LINE = /\n[ \t]*\n\s*/g;
const HEADING_LINE = /\n(?=#{1,6}[ \t])/g;
const SENTENCE_END = /[.!?](?:\s+|$)/g;

/**
 * Start offsets of every paragraph in `text`, always beginning with 0.
 * A paragraph starts after a blank line, or at a markdown heading line.
 * Each paragraph runs up to the next start, so the segments tile the text.
 */
export function findParagraphStarts(text: string): number[] {
  const starts = new Set<number>([0]);

  for (const match of text.matchAll(BLANK_LINE)) {
    starts.add((match.index ?? 0) + match[0].length);
  }
  for (const match of text.matchAll(HEADING_LINE)) {
    starts.add((match.index ?? 0) + 1);
  }

  return Array.from(starts)
    .filter((start) => start < text.length)
    .sort((a, b) => a - b);
}

/**
 * Position right after the last sentence terminator (plus its trailing
 * whitespace) found in `text[from, limit)`, or -1 when the window holds none.
 */
export function findSentenceCut(text: string, from: number, limit: number): number {
  const window = text.slice(from, limit);
  let cut = -1;

  for (const match of window.matchAll(SENTENCE_END)) {
    const end = (match.index ?? 0) + match[0].length;
    // A terminator at the very end of the window only counts when whitespace follows it
    if (match[0].length === 1 && end === window.length) {
      const next = text.charAt(limit);
      if (next !== '' && !/\s/.test(next)) continue;
    }
    cut = from + end;
  }

  return cut;
}

/**
 * True when `index` falls between the two halves of a surrogate pair, so a
 * cut there would leave a lone surrogate on each side.
 */
export function splitsSurrogatePair(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) return false;
  const before = text.charCodeAt(index - 1);
  const after = text.charCodeAt(index);
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}

export interface Document {
  readonly text: string;
  readonly source: string;
  readonly length: number;
}

/**
 * Wraps parser output in an immutable document. Chunk offsets always refer to `text`.
 */
export function createDocument(text: string, source: string): Document {
  return Object.freeze({ text, source, length: text.length });
}

// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

/**
 * Cleans extracted text the way document parsers are expected to before
 * handing it over: collapsed blank lines, single spaces, trimmed lines and no
 * control characters.
 */
export function normalizeText(raw: string): string {
  if (!raw) return '';

  const text = raw
    .replace(/\r\n?/g, '\n')
    .replace(CONTROL_CHARS, '')
    .replace(/\t/g, ' ')
    .replace(/ +/g, ' ');

  return text
    .split('\n')
    .map((line) => line.trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

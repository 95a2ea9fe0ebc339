const CONTRACTIONS: ReadonlyArray<[RegExp, string]> = [
  [/n't\b/g, ' not'],
  [/'re\b/g, ' are'],
  [/'s\b/g, ' is'],
  [/'ll\b/g, ' will'],
  [/'ve\b/g, ' have'],
  [/'m\b/g, ' am'],
  [/'d\b/g, ' would'],
];

/**
 * Lowercased word tokens with contractions expanded ("what's" -> "what is")
 * and punctuation dropped.
 */
export function normalizeTokens(text: string): string[] {
  let normalized = text.normalize('NFKC').toLowerCase().replace(/[‘’]/g, "'");
  for (const [pattern, replacement] of CONTRACTIONS) {
    normalized = normalized.replace(pattern, replacement);
  }
  return normalized.split(/[^\p{L}\p{N}]+/u).filter(Boolean);
}

export function tokenSet(text: string): Set<string> {
  return new Set(normalizeTokens(text));
}

/**
 * |A ∩ B| / |A ∪ B|. Zero when either side is empty.
 */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) return 0;

  let intersection = 0;
  for (const token of a) {
    if (b.has(token)) intersection++;
  }
  return intersection / (a.size + b.size - intersection);
}

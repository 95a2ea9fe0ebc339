import { HEDGE_TERMS } from './lexicon';
import type { QualityPolicy } from './types';

const HEDGE_PATTERNS = HEDGE_TERMS.map(
  (term) => new RegExp(`\\b${term.replace(/ /g, '\\s+')}\\b`, 'i')
);

export function splitIntoWords(text: string): string[] {
  return text.replace(/\s+/g, ' ').trim().split(' ').filter(Boolean);
}

export function countWords(text: string): number {
  return splitIntoWords(text).length;
}

/**
 * Distinct capitalized words that do not open a sentence; a rough count of
 * named entities.
 */
export function countProperNouns(text: string): number {
  const words = splitIntoWords(text);
  const found = new Set<string>();

  for (let i = 1; i < words.length; i++) {
    const previous = words[i - 1] ?? '';
    if (/[.!?:]$/.test(previous)) continue;
    const word = (words[i] ?? '').replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, '');
    if (/^\p{Lu}/u.test(word)) found.add(word);
  }

  return found.size;
}

export function answerLengthScore(answer: string, idealAnswerWords: number): number {
  return Math.min(countWords(answer) / idealAnswerWords, 1);
}

/**
 * 0.5 for containing a number, 0.25 per proper noun (up to two), capped at 1.
 */
export function specificityScore(answer: string): number {
  const numberScore = /\p{N}/u.test(answer) ? 0.5 : 0;
  const entityScore = 0.25 * Math.min(countProperNouns(answer), 2);
  return Math.min(1, numberScore + entityScore);
}

/**
 * 1 for a confident answer, minus 0.5 per distinct hedge term.
 */
export function hedgingScore(answer: string): number {
  const hedges = HEDGE_PATTERNS.filter((pattern) => pattern.test(answer)).length;
  return Math.max(0, 1 - 0.5 * hedges);
}

/**
 * Weighted blend of answer length, specificity and confidence, in [0, 1],
 * rounded to four decimals.
 */
export function calculateQualityScore(answer: string, policy: QualityPolicy): number {
  const { weights } = policy;
  const totalWeight = weights.length + weights.specificity + weights.hedging;
  if (totalWeight <= 0) return 0;

  const raw =
    weights.length * answerLengthScore(answer, policy.idealAnswerWords) +
    weights.specificity * specificityScore(answer) +
    weights.hedging * hedgingScore(answer);

  const score = Math.max(0, Math.min(1, raw / totalWeight));
  return Number(score.toFixed(4));
}

import type { RawCandidate } from '../generation/types';
import { jaccard, normalizeTokens, tokenSet } from '../similarity/tokens';
import { BOILERPLATE_PATTERNS } from './lexicon';
import { calculateQualityScore } from './scoring';
import {
  RejectionReason,
  type QualityPolicy,
  type RejectionReasonName,
  type ScoredCandidate,
} from './types';

export const DEFAULT_QUALITY_POLICY: QualityPolicy = {
  requireQuestionMark: true,
  minQuestionChars: 8,
  minQuestionTokens: 3,
  boilerplatePatterns: BOILERPLATE_PATTERNS,
  lowInformationThreshold: 0.8,
  idealAnswerWords: 30,
  weights: { length: 0.4, specificity: 0.3, hedging: 0.3 },
};

export function resolveQualityPolicy(overrides: Partial<QualityPolicy> = {}): QualityPolicy {
  return {
    ...DEFAULT_QUALITY_POLICY,
    ...overrides,
    weights: { ...DEFAULT_QUALITY_POLICY.weights, ...overrides.weights },
  };
}

/**
 * First rejection rule the candidate trips, or undefined when it passes all of them.
 */
export function findRejectionReason(
  candidate: Pick<RawCandidate, 'question' | 'answer'>,
  policy: QualityPolicy = DEFAULT_QUALITY_POLICY
): RejectionReasonName | undefined {
  const question = candidate.question.trim().replace(/\s+/g, ' ');
  const answer = candidate.answer.trim();

  if (!question || !answer || (policy.requireQuestionMark && !question.includes('?'))) {
    return RejectionReason.EMPTY_OR_MALFORMED;
  }

  if (
    question.length < policy.minQuestionChars ||
    normalizeTokens(question).length < policy.minQuestionTokens
  ) {
    return RejectionReason.TOO_SHORT;
  }

  if (policy.boilerplatePatterns.some((pattern) => pattern.test(question))) {
    return RejectionReason.BOILERPLATE;
  }

  if (jaccard(tokenSet(question), tokenSet(answer)) >= policy.lowInformationThreshold) {
    return RejectionReason.LOW_INFORMATION_ANSWER;
  }

  return undefined;
}

/**
 * Scores every candidate. Rejected ones are kept, with a zero score and their
 * reason, so callers can report on them; the merger ignores them. Input order
 * is preserved and the originals are not modified.
 */
export function filterCandidates(
  candidates: readonly RawCandidate[],
  policy: QualityPolicy = DEFAULT_QUALITY_POLICY
): ScoredCandidate[] {
  return candidates.map((candidate) => {
    const base = {
      question: candidate.question,
      answer: candidate.answer,
      sourceChunkIndex: candidate.sourceChunkIndex,
      charSpan: candidate.charSpan,
    };

    const rejectedReason = findRejectionReason(candidate, policy);
    if (rejectedReason) {
      return { ...base, qualityScore: 0, rejectedReason };
    }

    return { ...base, qualityScore: calculateQualityScore(candidate.answer, policy) };
  });
}

export function isAccepted(candidate: ScoredCandidate): boolean {
  return candidate.rejectedReason === undefined;
}

import type { RawCandidate } from '../generation/types';

/**
 * Rejection reasons, in the order the filter evaluates them.
 */
export const RejectionReason = {
  EMPTY_OR_MALFORMED: 'EmptyOrMalformed',
  TOO_SHORT: 'TooShort',
  BOILERPLATE: 'Boilerplate',
  LOW_INFORMATION_ANSWER: 'LowInformationAnswer',
} as const;

export type RejectionReasonName = typeof RejectionReason[keyof typeof RejectionReason];

export interface ScoredCandidate extends RawCandidate {
  qualityScore: number; // 0 for rejected candidates
  rejectedReason?: RejectionReasonName;
}

export interface QualityWeights {
  length: number;
  specificity: number;
  hedging: number;
}

export interface QualityPolicy {
  requireQuestionMark: boolean;
  minQuestionChars: number;
  minQuestionTokens: number;
  boilerplatePatterns: readonly RegExp[];
  // Question/answer token overlap at or above which the answer adds nothing
  lowInformationThreshold: number;
  // Answer length (in words) that earns the full length score
  idealAnswerWords: number;
  weights: QualityWeights;
}

import type { ScoredCandidate } from '../quality/types';
import type { SimilarityStrategy } from '../similarity/similarity';

export interface FAQCluster {
  members: ScoredCandidate[];
  representative: ScoredCandidate;
  mergedAnswer?: string; // Set only when members carried distinct answers
}

export interface FAQEntry {
  question: string;
  answer: string;
  sourceChunks: number[]; // Distinct chunk indices, ascending
  confidence: number;
  clusterSize: number;
  answerMerged: boolean;
}

export interface MergeOptions {
  similarityThreshold: number;
  // Answers at or above this similarity count as the same answer
  answerMergeThreshold: number;
  maxFaqs?: number | undefined;
  similarity?: SimilarityStrategy | undefined;
}

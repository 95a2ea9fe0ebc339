import { token_set_ratio } from 'fuzzball';
import { ConfigError } from '../errors/index';
import { jaccard, tokenSet } from './tokens';

/**
 * Similarity metric constants to avoid magic strings.
 */
export const SimilarityMetric = {
  JACCARD: 'jaccard',
  FUZZY_TOKEN_SET: 'fuzzy-token-set',
} as const;

export type SimilarityMetricName = typeof SimilarityMetric[keyof typeof SimilarityMetric];

/*
 * Pluggable text similarity used for question clustering and answer merging.
 * Implementations must be symmetric, deterministic and return values in [0, 1].
 */
export interface SimilarityStrategy {
  readonly name: string;
  similarity(a: string, b: string): number;
}

// Jaccard overlap of normalized token sets. Holds no per-text state.
export class JaccardSimilarity implements SimilarityStrategy {
  readonly name = SimilarityMetric.JACCARD;

  similarity(a: string, b: string): number {
    return jaccard(tokenSet(a), tokenSet(b));
  }
}

// fuzzball token_set_ratio, scaled from 0-100 to 0-1. More forgiving of typos and word order.
export class FuzzyTokenSetSimilarity implements SimilarityStrategy {
  readonly name = SimilarityMetric.FUZZY_TOKEN_SET;

  similarity(a: string, b: string): number {
    if (!a.trim() || !b.trim()) return 0;
    return token_set_ratio(a, b) / 100;
  }
}

export function createSimilarityStrategy(metric: SimilarityMetricName): SimilarityStrategy {
  switch (metric) {
    case SimilarityMetric.JACCARD:
      return new JaccardSimilarity();
    case SimilarityMetric.FUZZY_TOKEN_SET:
      return new FuzzyTokenSetSimilarity();
    default:
      throw new ConfigError(`Unsupported similarity metric: ${String(metric)}`);
  }
}

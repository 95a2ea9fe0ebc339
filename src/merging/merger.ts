import { isAccepted } from '../quality/quality-filter';
import type { ScoredCandidate } from '../quality/types';
import { JaccardSimilarity, type SimilarityStrategy } from '../similarity/similarity';
import type { FAQCluster, FAQEntry, MergeOptions } from './types';
import { UnionFind } from './union-find';

const DEFAULT_SIMILARITY: SimilarityStrategy = new JaccardSimilarity();

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// Document order: chunk, then span, then text so equal positions still sort stably
function compareProvenance(a: ScoredCandidate, b: ScoredCandidate): number {
  return (
    a.sourceChunkIndex - b.sourceChunkIndex ||
    a.charSpan[0] - b.charSpan[0] ||
    a.charSpan[1] - b.charSpan[1] ||
    compareText(a.question, b.question) ||
    compareText(a.answer, b.answer)
  );
}

function compareForRepresentative(a: ScoredCandidate, b: ScoredCandidate): number {
  return b.qualityScore - a.qualityScore || compareProvenance(a, b);
}

function buildCluster(
  members: ScoredCandidate[],
  answerMergeThreshold: number,
  similarity: SimilarityStrategy
): FAQCluster | undefined {
  const [representative] = [...members].sort(compareForRepresentative);
  if (!representative) return undefined;

  const ordered = [representative, ...members.filter((m) => m !== representative)];
  const distinct: ScoredCandidate[] = [];
  for (const member of ordered) {
    const isNew = distinct.every(
      (kept) => similarity.similarity(kept.answer, member.answer) < answerMergeThreshold
    );
    if (isNew) distinct.push(member);
  }

  if (distinct.length < 2) {
    return { members, representative };
  }

  const mergedAnswer = distinct
    .map((d) => `[chunk ${d.sourceChunkIndex}] ${d.answer.trim()}`)
    .join('\n\n');

  return { members, representative, mergedAnswer };
}

/**
 * Groups accepted candidates whose questions are near-duplicates.
 *
 * Single-linkage over a union-find: two candidates share a cluster iff a chain
 * of pairwise similarities at or above the threshold connects them. A~B and
 * B~C puts A, B and C together even when A~C is below the threshold. With a
 * low threshold these chains can drift and fuse loosely related questions into
 * one cluster.
 *
 * Rejected candidates never take part. Members of each cluster come back in
 * document order, and clusters are ordered by their first member, so the
 * result does not depend on input order.
 */
export function clusterCandidates(
  scored: readonly ScoredCandidate[],
  similarityThreshold: number,
  answerMergeThreshold: number,
  similarity: SimilarityStrategy = DEFAULT_SIMILARITY
): FAQCluster[] {
  const accepted = scored.filter(isAccepted);
  const sets = new UnionFind(accepted.length);

  for (let i = 0; i < accepted.length; i++) {
    for (let j = i + 1; j < accepted.length; j++) {
      if (sets.find(i) === sets.find(j)) continue;
      const a = accepted[i];
      const b = accepted[j];
      if (!a || !b) continue;
      if (similarity.similarity(a.question, b.question) >= similarityThreshold) {
        sets.union(i, j);
      }
    }
  }

  const clusters: FAQCluster[] = [];
  for (const group of sets.groups()) {
    const members = group
      .map((i) => accepted[i])
      .filter((m): m is ScoredCandidate => m !== undefined)
      .sort(compareProvenance);
    const cluster = buildCluster(members, answerMergeThreshold, similarity);
    if (cluster) clusters.push(cluster);
  }

  return clusters.sort((a, b) => {
    const [firstA] = a.members;
    const [firstB] = b.members;
    return firstA && firstB ? compareProvenance(firstA, firstB) : 0;
  });
}

/**
 * Representative quality carries most of the weight; cluster size and the
 * number of distinct chunks that produced the question add corroboration.
 */
export function calculateConfidence(cluster: FAQCluster): number {
  const size = cluster.members.length;
  const chunks = new Set(cluster.members.map((m) => m.sourceChunkIndex)).size;
  const raw =
    0.7 * cluster.representative.qualityScore +
    0.2 * (1 - 1 / size) +
    0.1 * (1 - 1 / Math.max(chunks, 1));
  return Number(Math.min(1, Math.max(0, raw)).toFixed(4));
}

export function toFaqEntry(cluster: FAQCluster): FAQEntry {
  const sourceChunks = Array.from(new Set(cluster.members.map((m) => m.sourceChunkIndex))).sort(
    (a, b) => a - b
  );
  return {
    question: cluster.representative.question.trim(),
    answer: cluster.mergedAnswer ?? cluster.representative.answer.trim(),
    sourceChunks,
    confidence: calculateConfidence(cluster),
    clusterSize: cluster.members.length,
    answerMerged: cluster.mergedAnswer !== undefined,
  };
}

/**
 * Clusters, merges and ranks scored candidates into the final FAQ list:
 * descending confidence, ties broken by first source chunk and then by the
 * representative's position. `maxFaqs` trims the ranked list afterwards and
 * never changes which clusters form.
 */
export function mergeCandidates(
  scored: readonly ScoredCandidate[],
  options: MergeOptions
): FAQEntry[] {
  const clusters = clusterCandidates(
    scored,
    options.similarityThreshold,
    options.answerMergeThreshold,
    options.similarity ?? DEFAULT_SIMILARITY
  );

  const ranked = clusters
    .map((cluster) => ({ cluster, entry: toFaqEntry(cluster) }))
    .sort(
      (a, b) =>
        b.entry.confidence - a.entry.confidence ||
        (a.entry.sourceChunks[0] ?? 0) - (b.entry.sourceChunks[0] ?? 0) ||
        a.cluster.representative.charSpan[0] - b.cluster.representative.charSpan[0] ||
        compareText(a.entry.question, b.entry.question)
    )
    .map(({ entry }) => entry);

  return options.maxFaqs !== undefined ? ranked.slice(0, options.maxFaqs) : ranked;
}

/**
 * Agglomerative clustering of a stance pool.
 *
 * Average-link over TF-IDF cosine similarity. The merge choice takes the
 * most similar pair and, on ties, the earliest (i, j) pair, so the result
 * depends only on the pool and its order.
 *
 * @module summarizer/clustering
 */

import type { SummarizerConfig } from "../config-schemas";
import { buildTfidfIndex, cosineSimilarity } from "../tfidf";
import type { EvidenceDocument } from "./types";

/** Document ids of one cluster, in pool order. */
export type Cluster = readonly string[];

/**
 * Number of perspectives to aim for: the configured count, or
 * round(poolSize / docsPerPerspective) under "auto"; clamped to
 * [1, min(poolSize, maxPerspectivesPerClaim)].
 */
export function chooseClusterCount(poolSize: number, synthesis: SummarizerConfig["synthesis"]): number {
  if (poolSize <= 0) return 0;
  const requested =
    synthesis.clusterCount === "auto"
      ? Math.round(poolSize / synthesis.docsPerPerspective)
      : synthesis.clusterCount;
  const upper = Math.min(poolSize, synthesis.maxPerspectivesPerClaim);
  return Math.max(1, Math.min(upper, requested));
}

/** Cluster `docs` into `k` groups. Returns one singleton per doc when k >= docs.length. */
export function clusterDocuments(docs: readonly EvidenceDocument[], k: number): Cluster[] {
  if (docs.length === 0) return [];
  const target = Math.max(1, Math.min(k, docs.length));

  const index = buildTfidfIndex(docs);
  const ids = docs.map((d) => d.id);
  const pairwise: number[][] = ids.map((a) =>
    ids.map((b) => cosineSimilarity(index.vectors.get(a) ?? new Map(), index.vectors.get(b) ?? new Map())),
  );

  // Members are positions into `ids`
  let clusters: number[][] = ids.map((_, i) => [i]);

  const averageLink = (a: number[], b: number[]): number => {
    let total = 0;
    for (const x of a) for (const y of b) total += pairwise[x][y];
    return total / (a.length * b.length);
  };

  while (clusters.length > target) {
    let best = { i: 0, j: 1, score: -Infinity };
    for (let i = 0; i < clusters.length; i++) {
      for (let j = i + 1; j < clusters.length; j++) {
        const score = averageLink(clusters[i], clusters[j]);
        if (score > best.score) best = { i, j, score };
      }
    }
    clusters = mergeClusterMembers(clusters, best.i, best.j);
  }

  return clusters.map((members) => members.map((m) => ids[m]));
}

function mergeClusterMembers(clusters: number[][], a: number, b: number): number[][] {
  const [i, j] = a < b ? [a, b] : [b, a];
  const merged = [...clusters[i], ...clusters[j]].sort((x, y) => x - y);
  return clusters.flatMap((c, idx) => (idx === i ? [merged] : idx === j ? [] : [c]));
}

/**
 * Merge clusters `a` and `b` into the position of the lower index. Member
 * order follows `poolOrder` when given, else concatenation order.
 */
export function mergeClusters(
  clusters: readonly Cluster[],
  a: number,
  b: number,
  poolOrder?: readonly string[],
): Cluster[] {
  if (a === b || a < 0 || b < 0 || a >= clusters.length || b >= clusters.length) {
    throw new RangeError(`Cannot merge clusters ${a} and ${b} of ${clusters.length}`);
  }
  const [i, j] = a < b ? [a, b] : [b, a];
  let merged = Array.from(new Set([...clusters[i], ...clusters[j]]));
  if (poolOrder) {
    const position = new Map(poolOrder.map((id, idx) => [id, idx]));
    merged = merged.sort((x, y) => (position.get(x) ?? Infinity) - (position.get(y) ?? Infinity));
  }
  return clusters.flatMap((c, idx) => (idx === i ? [merged] : idx === j ? [] : [c]));
}

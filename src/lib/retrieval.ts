/**
 * Local TF-IDF retrieval over the DocumentStore.
 *
 * Ranking is cosine similarity between the query and each document,
 * descending, with ties broken by ascending document id so the order is
 * reproducible for a fixed (query, corpus).
 *
 * @module retrieval
 */

import type { DocumentStore } from "./document-store";
import type { Query } from "./summarizer/types";
import { buildTfidfIndex, compareDocIds, cosineSimilarity, vectorize } from "./tfidf";

export interface RetrievalOptions {
  /** Per-query document budget. Tunable, not a hard cap on the corpus. */
  topK?: number;
  /** Restrict ranking to these ids (e.g. the docs supplied with a query) */
  candidateIds?: readonly string[];
}

export interface ScoredDocument {
  docId: string;
  score: number;
}

export interface Retriever {
  retrieve(query: Query, options?: RetrievalOptions): Promise<string[]>;
}

export const DEFAULT_TOP_K = 6;

export class TfidfRetriever implements Retriever {
  constructor(
    private readonly store: DocumentStore,
    private readonly defaultTopK: number = DEFAULT_TOP_K,
  ) {}

  /**
   * Score every candidate document. Zero-score documents are kept so a
   * non-empty corpus always yields a non-empty ranking.
   */
  rank(query: Query, candidateIds?: readonly string[]): ScoredDocument[] {
    const ids = candidateIds ?? this.store.ids();
    const { documents, missingIds } = this.store.getMany(ids);
    if (missingIds.length > 0) {
      console.warn(
        `[Retriever] Query ${query.id}: ${missingIds.length} candidate ids not in store (${missingIds.slice(0, 5).join(", ")})`,
      );
    }
    if (documents.size === 0) return [];

    const docs = Array.from(documents.values());
    const index = buildTfidfIndex(docs);
    const queryVector = vectorize(query.text, index);

    const scored: ScoredDocument[] = docs.map((doc) => {
      const docVector = index.vectors.get(doc.id);
      return {
        docId: doc.id,
        score: docVector ? cosineSimilarity(queryVector, docVector) : 0,
      };
    });

    scored.sort((a, b) => b.score - a.score || compareDocIds(a.docId, b.docId));
    return scored;
  }

  async retrieve(query: Query, options: RetrievalOptions = {}): Promise<string[]> {
    const topK = options.topK ?? this.defaultTopK;
    if (topK < 1) {
      throw new RangeError(`topK must be at least 1 (got ${topK})`);
    }

    const ranked = this.rank(query, options.candidateIds);
    const selected = ranked.slice(0, topK).map((s) => s.docId);
    console.log(
      `[Retriever] Query ${query.id}: selected ${selected.length}/${ranked.length} documents`,
    );
    return selected;
  }
}

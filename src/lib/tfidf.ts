/**
 * TF-IDF utilities shared by retrieval, clustering and lexical similarity.
 *
 * @module tfidf
 */

export type SparseVector = Map<string, number>;

const STOPWORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "but", "by", "for",
  "from", "has", "have", "in", "is", "it", "its", "of", "on", "or",
  "that", "the", "this", "to", "was", "were", "will", "with",
]);

/**
 * Lowercase word tokens (letters and digits, Unicode-aware), stopwords removed.
 */
export function tokenize(text: string): string[] {
  const words = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
  return words.filter((w) => !STOPWORDS.has(w));
}

function termFrequencies(tokens: string[]): Map<string, number> {
  const tf = new Map<string, number>();
  for (const t of tokens) tf.set(t, (tf.get(t) ?? 0) + 1);
  return tf;
}

function l2Normalize(vector: SparseVector): SparseVector {
  let sumSquares = 0;
  for (const v of vector.values()) sumSquares += v * v;
  if (sumSquares === 0) return vector;
  const norm = Math.sqrt(sumSquares);
  const out: SparseVector = new Map();
  for (const [term, v] of vector) out.set(term, v / norm);
  return out;
}

export interface TfidfIndex {
  /** Smoothed idf per term: ln((1 + N) / (1 + df)) + 1 */
  idf: Map<string, number>;
  /** L2-normalised document vectors keyed by document id */
  vectors: Map<string, SparseVector>;
  documentCount: number;
}

export function buildTfidfIndex(docs: ReadonlyArray<{ id: string; text: string }>): TfidfIndex {
  const tokenized = docs.map((d) => ({ id: d.id, tf: termFrequencies(tokenize(d.text)) }));

  const df = new Map<string, number>();
  for (const { tf } of tokenized) {
    for (const term of tf.keys()) df.set(term, (df.get(term) ?? 0) + 1);
  }

  const n = docs.length;
  const idf = new Map<string, number>();
  for (const [term, count] of df) {
    idf.set(term, Math.log((1 + n) / (1 + count)) + 1);
  }

  const vectors = new Map<string, SparseVector>();
  for (const { id, tf } of tokenized) {
    const raw: SparseVector = new Map();
    for (const [term, count] of tf) raw.set(term, count * (idf.get(term) ?? 0));
    vectors.set(id, l2Normalize(raw));
  }

  return { idf, vectors, documentCount: n };
}

/**
 * Vectorise free text against an existing index. Terms unseen by the index
 * carry no weight.
 */
export function vectorize(text: string, index: TfidfIndex): SparseVector {
  const raw: SparseVector = new Map();
  for (const [term, count] of termFrequencies(tokenize(text))) {
    const weight = index.idf.get(term);
    if (weight !== undefined) raw.set(term, count * weight);
  }
  return l2Normalize(raw);
}

/** Dot product of two L2-normalised vectors. */
export function cosineSimilarity(a: SparseVector, b: SparseVector): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let dot = 0;
  for (const [term, v] of small) {
    const w = large.get(term);
    if (w !== undefined) dot += v * w;
  }
  return dot;
}

const NUMERIC_ID = /^\d+$/;

/**
 * Ascending document-id order, total over mixed id shapes: numeric ids
 * first, compared numerically; then all other ids by code units.
 */
export function compareDocIds(a: string, b: string): number {
  const aNumeric = NUMERIC_ID.test(a);
  const bNumeric = NUMERIC_ID.test(b);
  if (aNumeric !== bNumeric) return aNumeric ? -1 : 1;
  if (aNumeric) {
    const x = a.replace(/^0+(?=\d)/, "");
    const y = b.replace(/^0+(?=\d)/, "");
    if (x.length !== y.length) return x.length - y.length;
    if (x !== y) return x < y ? -1 : 1;
  }
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Perspective similarity scoring.
 *
 * Two scorers share one batch interface: lexical Jaccard over content
 * tokens (deterministic, no model call) and a model-judged scorer that asks
 * for all pair scores in one prompt and falls back to lexical scores for any
 * pair the model leaves out.
 *
 * @module summarizer/text-similarity
 */

import { z } from "zod";
import type { SummarizerConfig } from "../config-schemas";
import { tokenize } from "../tfidf";
import type { TextGenerator } from "./generation";
import { parseModelJson } from "./json";
import { loadAndRenderSection } from "./prompt-loader";

export interface SimilarityPair {
  id: string;
  textA: string;
  textB: string;
}

export interface SimilarityScorer {
  readonly mode: "lexical" | "llm";
  /** Scores in [0, 1] keyed by pair id. */
  scoreBatch(pairs: readonly SimilarityPair[]): Promise<Map<string, number>>;
}

// ============================================================================
// LEXICAL
// ============================================================================

export function jaccardSimilarity(textA: string, textB: string): number {
  const a = new Set(tokenize(textA));
  const b = new Set(tokenize(textB));
  if (a.size === 0 && b.size === 0) {
    return textA.trim().toLowerCase() === textB.trim().toLowerCase() ? 1 : 0;
  }
  let intersection = 0;
  for (const token of a) if (b.has(token)) intersection++;
  return intersection / (a.size + b.size - intersection);
}

export class LexicalSimilarityScorer implements SimilarityScorer {
  readonly mode = "lexical" as const;

  async scoreBatch(pairs: readonly SimilarityPair[]): Promise<Map<string, number>> {
    return new Map(pairs.map((p) => [p.id, jaccardSimilarity(p.textA, p.textB)]));
  }
}

// ============================================================================
// MODEL-JUDGED
// ============================================================================

const ScoreArraySchema = z.array(z.number());

export class LlmSimilarityScorer implements SimilarityScorer {
  readonly mode = "llm" as const;
  private readonly fallback = new LexicalSimilarityScorer();

  constructor(private readonly generator: TextGenerator) {}

  async scoreBatch(pairs: readonly SimilarityPair[]): Promise<Map<string, number>> {
    if (pairs.length === 0) return new Map();

    const lexical = await this.fallback.scoreBatch(pairs);
    const { content } = await loadAndRenderSection("SIMILARITY_BATCH", {
      PAIRS: pairs.map((p, i) => `${i + 1}. A: ${p.textA}\n   B: ${p.textB}`).join("\n"),
    });
    const raw = await this.generator.generate(content, { task: "similarity", temperature: 0 });

    const parsed = ScoreArraySchema.safeParse(parseModelJson(raw));
    if (!parsed.success) {
      console.warn(`[Similarity] Unparseable score batch for ${pairs.length} pairs; using lexical scores`);
      return lexical;
    }
    if (parsed.data.length !== pairs.length) {
      console.warn(
        `[Similarity] Expected ${pairs.length} scores, got ${parsed.data.length}; missing pairs use lexical scores`,
      );
    }

    const scores = new Map<string, number>();
    pairs.forEach((pair, i) => {
      const score = parsed.data[i];
      scores.set(
        pair.id,
        score === undefined || !Number.isFinite(score) ? (lexical.get(pair.id) ?? 0) : Math.min(1, Math.max(0, score)),
      );
    });
    return scores;
  }
}

export function createSimilarityScorer(config: SummarizerConfig, generator: TextGenerator): SimilarityScorer {
  return config.similarity.mode === "llm" ? new LlmSimilarityScorer(generator) : new LexicalSimilarityScorer();
}

// ============================================================================
// NEAR-DUPLICATE SEARCH
// ============================================================================

export interface NearDuplicatePair {
  /** Lower index of the pair */
  first: number;
  second: number;
  similarity: number;
}

/**
 * Every pair (i < j) whose similarity is at or above `threshold`, in
 * (i, j) order. All pairs go to the scorer in one batch.
 */
export async function findNearDuplicatePairs(
  texts: readonly string[],
  scorer: SimilarityScorer,
  threshold: number,
): Promise<NearDuplicatePair[]> {
  const pairs: SimilarityPair[] = [];
  for (let i = 0; i < texts.length; i++) {
    for (let j = i + 1; j < texts.length; j++) {
      pairs.push({ id: `${i}:${j}`, textA: texts[i], textB: texts[j] });
    }
  }
  if (pairs.length === 0) return [];

  const scores = await scorer.scoreBatch(pairs);
  const duplicates: NearDuplicatePair[] = [];
  for (const pair of pairs) {
    const similarity = scores.get(pair.id) ?? 0;
    if (similarity >= threshold) {
      const [first, second] = pair.id.split(":").map(Number);
      duplicates.push({ first, second, similarity });
    }
  }
  return duplicates;
}

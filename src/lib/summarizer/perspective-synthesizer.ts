/**
 * Perspective Synthesis
 *
 * Builds one claim for one polarity from its stance pool:
 * 1. cluster the pool (average-link TF-IDF)
 * 2. one perspective sentence per cluster, grounded by the cluster's ids
 * 3. near-duplicate check; the first offending pair is merged and only the
 *    merged cluster's perspective is regenerated
 * 4. one short claim over the final perspectives
 *
 * Supporting ids always come from the clusters, never from model output.
 *
 * @module summarizer/perspective-synthesizer
 */

import { z } from "zod";
import { DEFAULT_SUMMARIZER_CONFIG, type SummarizerConfig } from "../config-schemas";
import { chooseClusterCount, clusterDocuments, mergeClusters, type Cluster } from "./clustering";
import { debugLog } from "./debug";
import { InsufficientEvidenceError, SynthesisExhaustedError, type RejectionReason } from "./errors";
import type { TextGenerator } from "./generation";
import { stripCodeFences } from "./json";
import { loadAndRenderSection } from "./prompt-loader";
import { generateWithSchemaRetry } from "./schema-retry";
import { formatDocumentsForPrompt } from "./stance-partition";
import { findNearDuplicatePairs, type SimilarityScorer } from "./text-similarity";
import type { Claim, EvidenceDocument, Perspective, Polarity, Query } from "./types";

const PERSPECTIVE_TARGET_WORDS = 12;
const CLAIM_TARGET_WORDS = 5;

const SentenceSchema = z.string().min(1);

const EMPTY_OUTPUT_REPAIR = "Your previous answer was empty or unusable. Return exactly one sentence and nothing else.";

// ============================================================================
// TEXT NORMALISATION
// ============================================================================

const QUOTES = /^["'“”‘’`]+|["'“”‘’`]+$/g;

/** Title and Latin abbreviations that end in a period without ending a sentence. */
const ABBREVIATIONS = new Set([
  "dr", "mr", "mrs", "ms", "prof", "sr", "jr", "st", "vs", "etc", "inc", "ltd", "co", "no", "fig", "approx", "cf",
]);

function isAbbreviation(token: string): boolean {
  const bare = token.replace(/^[("'“‘]+/, "").replace(/\.$/, "").toLowerCase();
  // Dotted initialisms: U.S, e.g, i.e, a.m
  return ABBREVIATIONS.has(bare) || /^(?:\p{L}\.)*\p{L}$/u.test(bare);
}

/**
 * Text up to the first sentence boundary: a token ending in . ! or ?
 * followed by a token that opens with an uppercase letter, where a period
 * does not close an abbreviation.
 */
function firstSentence(text: string): string {
  const tokens = text.split(" ");
  for (let i = 0; i < tokens.length - 1; i++) {
    const token = tokens[i];
    if (!/[.!?]["'”’)]*$/.test(token)) continue;
    if (!/^["'“‘(]*\p{Lu}/u.test(tokens[i + 1])) continue;
    if (/\.["'”’)]*$/.test(token) && isAbbreviation(token.replace(/["'”’)]+$/, ""))) continue;
    return tokens.slice(0, i + 1).join(" ");
  }
  return text;
}

/**
 * Reduce model output to one clean sentence: fences, list markers, labels
 * and wrapping quotes removed, whitespace collapsed, first sentence kept.
 */
export function normalizeGeneratedSentence(raw: string): string {
  let text = stripCodeFences(raw).replace(/\s+/g, " ").trim();
  text = text.replace(/^(?:[-*•]\s+|\d+[.)]\s+)/, "");
  text = text.replace(/^(?:perspective|claim)\s*:\s*/i, "");
  text = text.replace(QUOTES, "").trim();
  return firstSentence(text).replace(QUOTES, "").trim();
}

function clusterKey(cluster: Cluster): string {
  return cluster.join("\u0001");
}

// ============================================================================
// SYNTHESIZER
// ============================================================================

export class PerspectiveSynthesizer {
  constructor(
    private readonly generator: TextGenerator,
    private readonly scorer: SimilarityScorer,
    private readonly config: SummarizerConfig = DEFAULT_SUMMARIZER_CONFIG,
  ) {}

  /**
   * Build a claim for `polarity` from `pool`. Throws
   * InsufficientEvidenceError for an empty pool and SynthesisExhaustedError
   * when near-duplicates survive `synthesis.maxAttempts` rounds.
   */
  async synthesize(pool: readonly EvidenceDocument[], polarity: Polarity, query: Query): Promise<Claim> {
    const docs = uniqueDocuments(pool);
    if (docs.length === 0) throw new InsufficientEvidenceError(polarity, query.id);

    const k = chooseClusterCount(docs.length, this.config.synthesis);
    const clusters = clusterDocuments(docs, k);
    console.log(
      `[Synthesizer] Query ${query.id} ${polarity}: ${docs.length} documents in ${clusters.length} clusters`,
    );
    return this.synthesizeFromClusters(clusters, docs, polarity, query, new Map());
  }

  /**
   * Targeted repair after a validator rejection. A duplicate rejection merges
   * the two offending clusters and regenerates only the merged perspective;
   * any other rejection re-synthesizes the branch from the pool.
   */
  async regenerate(
    claim: Claim,
    rejection: RejectionReason,
    pool: readonly EvidenceDocument[],
    query: Query,
  ): Promise<Claim> {
    const docs = uniqueDocuments(pool);
    if (rejection.kind !== "duplicate-perspective" || rejection.polarity !== claim.polarity) {
      console.log(`[Synthesizer] Query ${query.id} ${claim.polarity}: re-synthesizing after ${rejection.kind}`);
      return this.synthesize(docs, claim.polarity, query);
    }

    const poolIds = new Set(docs.map((d) => d.id));
    const clusters: Cluster[] = claim.perspectives.map((p) => p.supportingDocIds.filter((id) => poolIds.has(id)));
    const { perspectiveIndex, duplicateOfIndex } = rejection;
    if (
      clusters.some((c) => c.length === 0) ||
      perspectiveIndex >= clusters.length ||
      duplicateOfIndex >= clusters.length ||
      perspectiveIndex === duplicateOfIndex
    ) {
      return this.synthesize(docs, claim.polarity, query);
    }

    const known = new Map<string, string>();
    claim.perspectives.forEach((p, i) => known.set(clusterKey(clusters[i]), p.text));

    const merged = mergeClusters(clusters, perspectiveIndex, duplicateOfIndex, docs.map((d) => d.id));
    console.log(
      `[Synthesizer] Query ${query.id} ${claim.polarity}: merged perspectives ${duplicateOfIndex} and ${perspectiveIndex} after duplicate rejection`,
    );
    return this.synthesizeFromClusters(merged, docs, claim.polarity, query, known);
  }

  private async synthesizeFromClusters(
    initialClusters: readonly Cluster[],
    docs: readonly EvidenceDocument[],
    polarity: Polarity,
    query: Query,
    known: Map<string, string>,
  ): Promise<Claim> {
    const { maxAttempts } = this.config.synthesis;
    const threshold = this.config.similarity.nearDuplicateThreshold;
    const poolOrder = docs.map((d) => d.id);
    const byId = new Map(docs.map((d) => [d.id, d]));

    let clusters = [...initialClusters];
    let lastRejection: RejectionReason | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const texts = await Promise.all(
        clusters.map(async (cluster) => {
          const key = clusterKey(cluster);
          const cached = known.get(key);
          if (cached !== undefined) return cached;
          const clusterDocs = cluster.flatMap((id) => {
            const doc = byId.get(id);
            return doc ? [doc] : [];
          });
          const text = await this.generatePerspective(clusterDocs, polarity, query);
          known.set(key, text);
          return text;
        }),
      );

      const duplicates = await findNearDuplicatePairs(texts, this.scorer, threshold);
      if (duplicates.length === 0) {
        const perspectives: Perspective[] = clusters.map((cluster, i) =>
          Object.freeze({ text: texts[i], supportingDocIds: Object.freeze([...cluster]) }),
        );
        const claimText = await this.generateClaim(perspectives, polarity, query);
        debugLog(`[Synthesizer] Query ${query.id} ${polarity} claim after ${attempt} attempt(s)`, {
          claim: claimText,
          perspectives: perspectives.map((p) => ({ text: p.text, docIds: p.supportingDocIds })),
        });
        return Object.freeze({ text: claimText, polarity, perspectives: Object.freeze(perspectives) });
      }

      const { first, second, similarity } = duplicates[0];
      lastRejection = {
        kind: "duplicate-perspective",
        polarity,
        perspectiveIndex: second,
        duplicateOfIndex: first,
        similarity,
        message: `Perspectives ${first} and ${second} overlap (similarity ${similarity.toFixed(2)})`,
      };
      console.log(
        `[Synthesizer] Query ${query.id} ${polarity}: attempt ${attempt}/${maxAttempts} found near-duplicate perspectives ${first} and ${second} (${similarity.toFixed(2)}), merging`,
      );
      clusters = mergeClusters(clusters, first, second, poolOrder);
    }

    throw new SynthesisExhaustedError(
      polarity,
      maxAttempts,
      lastRejection,
      clusters.map((c) => [...c]),
      query.id,
    );
  }

  private async generatePerspective(
    clusterDocs: readonly EvidenceDocument[],
    polarity: Polarity,
    query: Query,
  ): Promise<string> {
    const { content } = await loadAndRenderSection("PERSPECTIVE", {
      QUERY: query.text,
      POLARITY: polarity,
      MAX_WORDS: String(PERSPECTIVE_TARGET_WORDS),
      DOCUMENTS: formatDocumentsForPrompt(clusterDocs, this.config.synthesis.maxDocChars),
    });
    return this.generateSentence(content, "perspective");
  }

  private async generateClaim(perspectives: readonly Perspective[], polarity: Polarity, query: Query): Promise<string> {
    const { content } = await loadAndRenderSection("CLAIM", {
      QUERY: query.text,
      POLARITY: polarity,
      MAX_WORDS: String(CLAIM_TARGET_WORDS),
      PERSPECTIVES: perspectives.map((p) => `- ${p.text}`).join("\n"),
    });
    return this.generateSentence(content, "claim");
  }

  private generateSentence(prompt: string, task: "perspective" | "claim"): Promise<string> {
    return generateWithSchemaRetry(
      SentenceSchema,
      async (retryPrompt) => {
        const text = await this.generator.generate(retryPrompt ? `${prompt}\n\n${EMPTY_OUTPUT_REPAIR}` : prompt, {
          task,
        });
        return normalizeGeneratedSentence(text);
      },
      { maxRetries: this.config.generation.maxSchemaRetries },
    );
  }
}

function uniqueDocuments(pool: readonly EvidenceDocument[]): EvidenceDocument[] {
  const seen = new Set<string>();
  return pool.filter((d) => {
    if (seen.has(d.id)) return false;
    seen.add(d.id);
    return true;
  });
}

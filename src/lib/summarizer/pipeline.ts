/**
 * Summarization pipeline for one query:
 * retrieve → partition → synthesize pro/con (concurrently) → validate →
 * targeted regeneration → assemble.
 *
 * @module summarizer/pipeline
 */

import { loadSummarizerConfig } from "../config-loader";
import type { SummarizerConfig } from "../config-schemas";
import type { DocumentStore } from "../document-store";
import { CachedTextGenerator, GenerationCache } from "../generation-cache";
import type { ParsedInput } from "../input-record";
import { TfidfRetriever, type Retriever } from "../retrieval";
import { summarizeBatch, type BatchConfig, type BatchOutcome } from "./batch-runner";
import { debugLog } from "./debug";
import { SynthesisExhaustedError, type RejectionReason } from "./errors";
import { AiSdkTextGenerator, ResilientTextGenerator, type TextGenerator } from "./generation";
import { GroundingValidator, type ValidationOutcome } from "./grounding-validator";
import { PerspectiveSynthesizer } from "./perspective-synthesizer";
import { assembleResult } from "./result-assembler";
import {
  LabeledStancePartitioner,
  LlmStancePartitioner,
  assertStancePools,
  type StanceLabels,
  type StancePartitioner,
} from "./stance-partition";
import { createSimilarityScorer } from "./text-similarity";
import type { Claim, EvidenceDocument, Polarity, Query, StancePools, SummaryResult } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export interface SummarizerDependencies {
  config: SummarizerConfig;
  store: DocumentStore;
  retriever: Retriever;
  partitioner: StancePartitioner;
  synthesizer: PerspectiveSynthesizer;
  validator: GroundingValidator;
}

export interface SummarizeOptions {
  /** Restrict retrieval to the documents supplied with the query */
  candidateIds?: readonly string[];
  topK?: number;
}

// ============================================================================
// PIPELINE
// ============================================================================

function poolDocuments(store: DocumentStore, ids: readonly string[]): EvidenceDocument[] {
  const { documents } = store.getMany(ids);
  return ids.flatMap((id) => {
    const doc = documents.get(id);
    return doc ? [doc] : [];
  });
}

/**
 * Summarize one query. Fails with InsufficientEvidenceError when either
 * stance pool is empty and with SynthesisExhaustedError when validation
 * still rejects after `synthesis.maxAttempts` rounds; never returns a
 * partial result.
 */
export async function summarizeQuery(
  deps: SummarizerDependencies,
  query: Query,
  options: SummarizeOptions = {},
): Promise<SummaryResult> {
  const { config, store, retriever, partitioner, synthesizer, validator } = deps;

  const retrieved = await retriever.retrieve(query, {
    topK: options.topK ?? config.retrieval.topK,
    candidateIds: options.candidateIds,
  });

  const pools: StancePools = await partitioner.partition(query, retrieved);
  console.log(
    `[Pipeline] Query ${query.id}: ${pools.pro.length} pro, ${pools.con.length} con, ${pools.excluded.length} excluded`,
  );
  assertStancePools(pools, query, retrieved.length);

  const poolDocs: Record<Polarity, EvidenceDocument[]> = {
    pro: poolDocuments(store, pools.pro),
    con: poolDocuments(store, pools.con),
  };

  let [claimPro, claimCon] = await Promise.all([
    synthesizer.synthesize(poolDocs.pro, "pro", query),
    synthesizer.synthesize(poolDocs.con, "con", query),
  ]);

  const { maxAttempts } = config.synthesis;
  let attempt = 1;
  let outcome: ValidationOutcome = await validator.validate(assembleResult(query, claimPro, claimCon), retrieved, pools);

  while (!outcome.ok) {
    const rejection = outcome.rejection;
    console.warn(
      `[Pipeline] Query ${query.id}: validation attempt ${attempt}/${maxAttempts} rejected (${rejection.kind}): ${rejection.message}`,
    );
    if (attempt >= maxAttempts) {
      const polarity: Polarity = rejection.polarity ?? "pro";
      const failing = polarity === "pro" ? claimPro : claimCon;
      throw new SynthesisExhaustedError(
        polarity,
        maxAttempts,
        rejection,
        failing.perspectives.map((p) => [...p.supportingDocIds]),
        query.id,
      );
    }
    attempt++;

    const regenerate = (claim: Claim): Promise<Claim> =>
      synthesizer.regenerate(claim, rejection, poolDocs[claim.polarity], query);

    const repaired: Claim[] = [];
    if (rejection.polarity === null) {
      [claimPro, claimCon] = await Promise.all([regenerate(claimPro), regenerate(claimCon)]);
      repaired.push(claimPro, claimCon);
    } else if (rejection.polarity === "pro") {
      claimPro = await regenerate(claimPro);
      repaired.push(claimPro);
    } else {
      claimCon = await regenerate(claimCon);
      repaired.push(claimCon);
    }

    // A repaired branch that fails on its own uses up the attempt without a full check
    const branchRejection = await firstBranchRejection(validator, repaired, retrieved, pools);
    outcome = branchRejection
      ? { ok: false, rejection: branchRejection, warnings: [] }
      : await validator.validate(assembleResult(query, claimPro, claimCon), retrieved, pools);
  }

  debugLog(`[Pipeline] Query ${query.id} validated on attempt ${attempt}`, {
    retrieved,
    warnings: outcome.warnings,
  });
  return outcome.result;
}

async function firstBranchRejection(
  validator: GroundingValidator,
  claims: readonly Claim[],
  retrieved: readonly string[],
  pools: StancePools,
): Promise<RejectionReason | null> {
  for (const claim of claims) {
    const check = await validator.validateClaim(claim, retrieved, pools[claim.polarity]);
    if (!check.ok) return check.rejection;
  }
  return null;
}

// ============================================================================
// WIRING
// ============================================================================

export interface CreateSummarizerOptions {
  store: DocumentStore;
  config?: SummarizerConfig;
  /** Backing generator; defaults to the AI SDK generator for the configured provider */
  generator?: TextGenerator;
  /** Gold stance labels per query id; when given, no model call partitions documents */
  stanceLabels?: ReadonlyMap<string, StanceLabels>;
}

export class Summarizer {
  private constructor(
    readonly deps: SummarizerDependencies,
    private readonly cache: GenerationCache | null,
  ) {}

  /**
   * Wire the pipeline from configuration. Generation calls go through the
   * cache (when enabled) and then deadline/retry/circuit-breaker handling.
   */
  static create(options: CreateSummarizerOptions): Summarizer {
    const config = options.config ?? loadSummarizerConfig().config;

    const base = options.generator ?? new AiSdkTextGenerator(config);
    const resilient = ResilientTextGenerator.fromConfig(base, config);
    const cache = config.cache.enabled ? GenerationCache.fromConfig(config) : null;
    const generator: TextGenerator = cache ? new CachedTextGenerator(resilient, cache) : resilient;

    const scorer = createSimilarityScorer(config, generator);
    const partitioner: StancePartitioner = options.stanceLabels
      ? new LabeledStancePartitioner(options.stanceLabels)
      : new LlmStancePartitioner(options.store, generator, config);

    return new Summarizer(
      {
        config,
        store: options.store,
        retriever: new TfidfRetriever(options.store, config.retrieval.topK),
        partitioner,
        synthesizer: new PerspectiveSynthesizer(generator, scorer, config),
        validator: new GroundingValidator(scorer, config),
      },
      cache,
    );
  }

  summarizeQuery(query: Query, options: SummarizeOptions = {}): Promise<SummaryResult> {
    return summarizeQuery(this.deps, query, options);
  }

  /** Batch run limited to `batch.maxConcurrency` queries at a time unless overridden. */
  summarizeBatch(inputs: readonly ParsedInput[], options: Partial<BatchConfig> = {}): Promise<BatchOutcome[]> {
    return summarizeBatch(inputs, this, {
      maxConcurrency: options.maxConcurrency ?? this.deps.config.batch.maxConcurrency,
      onProgress: options.onProgress,
    });
  }

  async close(): Promise<void> {
    if (this.cache) await this.cache.close();
  }
}

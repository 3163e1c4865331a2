/**
 * Stance Partitioning
 *
 * Splits a query's retrieved documents into disjoint pro / con pools.
 * Two implementations:
 * - LlmStancePartitioner: model-judged stance per document
 * - LabeledStancePartitioner: gold favour/against id lists per query
 *
 * Both keep the retrieval order inside each pool.
 *
 * @module summarizer/stance-partition
 */

import { z } from "zod";
import type { DocumentStore } from "../document-store";
import { DEFAULT_SUMMARIZER_CONFIG, type SummarizerConfig } from "../config-schemas";
import { debugLog } from "./debug";
import { InsufficientEvidenceError } from "./errors";
import type { TextGenerator } from "./generation";
import { loadAndRenderSection } from "./prompt-loader";
import { generateJsonWithSchemaRetry } from "./schema-retry";
import type { EvidenceDocument, Polarity, Query, StancePools } from "./types";

export interface StancePartitioner {
  partition(query: Query, docIds: readonly string[]): Promise<StancePools>;
}

// ============================================================================
// PROMPT HELPERS
// ============================================================================

export function truncateText(text: string, maxChars: number): string {
  const clean = text.replace(/\s+/g, " ").trim();
  return clean.length <= maxChars ? clean : `${clean.slice(0, maxChars).trimEnd()}…`;
}

/** `[docId: <id>]` header followed by the (truncated) text, one block per doc. */
export function formatDocumentsForPrompt(docs: readonly EvidenceDocument[], maxChars: number): string {
  return docs.map((d) => `[docId: ${d.id}]\n${truncateText(d.text, maxChars)}`).join("\n\n");
}

// ============================================================================
// MODEL-JUDGED PARTITION
// ============================================================================

const StanceAssignmentSchema = z.object({
  assignments: z.array(
    z.object({
      // Models sometimes echo numeric ids as numbers
      docId: z.union([z.string(), z.number()]).transform(String),
      stance: z.enum(["pro", "con", "neutral"]),
    }),
  ),
});

type StanceLabel = "pro" | "con" | "neutral";

/**
 * Build pools from raw assignments. Ids outside `docIds` are ignored; a
 * document given more than one distinct stance is excluded, as are neutral
 * and unassigned documents.
 */
export function buildStancePools(
  docIds: readonly string[],
  assignments: ReadonlyArray<{ docId: string; stance: StanceLabel }>,
): { pools: StancePools; unknownIds: string[]; conflictingIds: string[] } {
  const allowed = new Set(docIds);
  const stances = new Map<string, Set<StanceLabel>>();
  const unknownIds: string[] = [];

  for (const { docId, stance } of assignments) {
    if (!allowed.has(docId)) {
      if (!unknownIds.includes(docId)) unknownIds.push(docId);
      continue;
    }
    const set = stances.get(docId) ?? new Set<StanceLabel>();
    set.add(stance);
    stances.set(docId, set);
  }

  const pro: string[] = [];
  const con: string[] = [];
  const excluded: string[] = [];
  const conflictingIds: string[] = [];

  for (const id of docIds) {
    const set = stances.get(id);
    if (set && set.size > 1) conflictingIds.push(id);
    if (!set || set.size !== 1) {
      excluded.push(id);
    } else if (set.has("pro")) {
      pro.push(id);
    } else if (set.has("con")) {
      con.push(id);
    } else {
      excluded.push(id);
    }
  }

  return { pools: { pro, con, excluded }, unknownIds, conflictingIds };
}

export class LlmStancePartitioner implements StancePartitioner {
  constructor(
    private readonly store: DocumentStore,
    private readonly generator: TextGenerator,
    private readonly config: SummarizerConfig = DEFAULT_SUMMARIZER_CONFIG,
  ) {}

  async partition(query: Query, docIds: readonly string[]): Promise<StancePools> {
    const { documents, missingIds } = this.store.getMany(docIds);
    if (missingIds.length > 0) {
      console.warn(`[Stance-Partition] Query ${query.id}: skipping ${missingIds.length} unknown documents`);
    }
    const docs = docIds.flatMap((id) => {
      const doc = documents.get(id);
      return doc ? [doc] : [];
    });
    const present = docs.map((d) => d.id);
    if (docs.length === 0) return { pro: [], con: [], excluded: [] };

    const { content } = await loadAndRenderSection("STANCE_PARTITION", {
      QUERY: query.text,
      DOCUMENTS: formatDocumentsForPrompt(docs, this.config.partition.maxDocChars),
    });

    const parsed = await generateJsonWithSchemaRetry(
      StanceAssignmentSchema,
      content,
      (prompt) => this.generator.generate(prompt, { task: "partition", temperature: 0 }),
      { maxRetries: this.config.generation.maxSchemaRetries },
    );

    const { pools, unknownIds, conflictingIds } = buildStancePools(present, parsed.assignments);
    if (unknownIds.length > 0) {
      console.warn(`[Stance-Partition] Query ${query.id}: ignoring assignments for unknown ids ${unknownIds.join(", ")}`);
    }
    if (conflictingIds.length > 0) {
      console.warn(`[Stance-Partition] Query ${query.id}: conflicting stances, excluded ${conflictingIds.join(", ")}`);
    }

    debugLog(`[Stance-Partition] Query ${query.id}`, {
      pro: pools.pro,
      con: pools.con,
      excluded: pools.excluded,
    });
    return pools;
  }
}

// ============================================================================
// GOLD-LABELLED PARTITION
// ============================================================================

export interface StanceLabels {
  favorIds: readonly (string | number)[];
  againstIds: readonly (string | number)[];
}

export class LabeledStancePartitioner implements StancePartitioner {
  private readonly labels: ReadonlyMap<string, StanceLabels>;

  constructor(labels: ReadonlyMap<string, StanceLabels> | Record<string, StanceLabels>) {
    this.labels = labels instanceof Map ? labels : new Map(Object.entries(labels));
  }

  async partition(query: Query, docIds: readonly string[]): Promise<StancePools> {
    const label = this.labels.get(query.id);
    if (!label) {
      console.warn(`[Stance-Partition] No stance labels for query ${query.id}`);
      return { pro: [], con: [], excluded: [...docIds] };
    }

    const favor = new Set(label.favorIds.map(String));
    const against = new Set(label.againstIds.map(String));

    const assignments: Array<{ docId: string; stance: StanceLabel }> = [];
    for (const id of docIds) {
      if (favor.has(id)) assignments.push({ docId: id, stance: "pro" });
      if (against.has(id)) assignments.push({ docId: id, stance: "con" });
    }

    return buildStancePools(docIds, assignments).pools;
  }
}

// ============================================================================
// POOL CHECK
// ============================================================================

/** Throws InsufficientEvidenceError for the first empty pool, pro before con. */
export function assertStancePools(pools: StancePools, query: Query, retrievedCount: number): void {
  const order: Polarity[] = ["pro", "con"];
  for (const polarity of order) {
    if (pools[polarity].length === 0) {
      throw new InsufficientEvidenceError(polarity, query.id, retrievedCount);
    }
  }
}

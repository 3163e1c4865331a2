/**
 * Input records
 *
 * `{ "id"?: string | number, "query": string, "docs": { "<docId>": text },
 *    "favor_ids"?: [...], "against_ids"?: [...] }`
 *
 * Query identity is the record id (default `query_<index>`); records with
 * identical query text stay separate.
 *
 * @module input-record
 */

import { z } from "zod";
import { DocumentStore, type DocumentInput } from "./document-store";
import type { StanceLabels } from "./summarizer/stance-partition";
import type { Query } from "./summarizer/types";

const IdSchema = z.union([z.string().min(1), z.number().int()]).transform(String);

export const InputRecordSchema = z.object({
  id: IdSchema.optional(),
  query: z.string().trim().min(1, "query must not be empty"),
  docs: z.record(z.string(), z.string()),
  favor_ids: z.array(IdSchema).optional(),
  against_ids: z.array(IdSchema).optional(),
});

export interface ParsedInput {
  query: Query;
  /** Ids of the documents supplied with this query, in `Object.keys` order */
  docIds: string[];
  docs: Record<string, string>;
  labels?: StanceLabels;
}

export function parseInputRecord(raw: unknown, index: number): ParsedInput {
  const parsed = InputRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "root"}: ${i.message}`).join("; ");
    throw new Error(`Invalid input record at index ${index}: ${issues}`);
  }

  const { id, query, docs, favor_ids, against_ids } = parsed.data;
  const labels =
    favor_ids || against_ids ? { favorIds: favor_ids ?? [], againstIds: against_ids ?? [] } : undefined;

  return {
    query: Object.freeze({ id: id ?? `query_${index}`, text: query }),
    docIds: Object.keys(docs),
    docs,
    labels,
  };
}

/**
 * Parse a batch. Query ids must be unique across the batch, and a document
 * id supplied by more than one record must carry the same text in each.
 */
export function parseInputRecords(raw: readonly unknown[]): ParsedInput[] {
  const seen = new Set<string>();
  const inputs = raw.map((record, index) => {
    const input = parseInputRecord(record, index);
    if (seen.has(input.query.id)) {
      throw new Error(`Duplicate query id "${input.query.id}" at index ${index}`);
    }
    seen.add(input.query.id);
    return input;
  });
  collectDocumentTexts(inputs);
  return inputs;
}

function collectDocumentTexts(inputs: readonly ParsedInput[]): Map<string, string> {
  const texts = new Map<string, { text: string; queryId: string }>();
  for (const input of inputs) {
    for (const [docId, text] of Object.entries(input.docs)) {
      const existing = texts.get(docId);
      if (!existing) {
        texts.set(docId, { text, queryId: input.query.id });
      } else if (existing.text !== text) {
        throw new Error(
          `Document "${docId}" has different texts in queries "${existing.queryId}" and "${input.query.id}"`,
        );
      }
    }
  }
  return new Map(Array.from(texts, ([id, entry]) => [id, entry.text]));
}

/** One store for all records. Throws when records disagree on a document's text. */
export function buildDocumentStore(inputs: readonly ParsedInput[]): DocumentStore {
  const documents: DocumentInput[] = Array.from(collectDocumentTexts(inputs), ([id, text]) => ({ id, text }));
  return new DocumentStore(documents);
}

export function collectStanceLabels(inputs: readonly ParsedInput[]): Map<string, StanceLabels> {
  const labels = new Map<string, StanceLabels>();
  for (const input of inputs) {
    if (input.labels) labels.set(input.query.id, input.labels);
  }
  return labels;
}

/**
 * Document Store
 *
 * Holds evidence documents keyed by id. Reads go against an immutable
 * snapshot and need no locking; `ingest` serializes writers and swaps in a
 * fresh snapshot when each write completes.
 *
 * @module document-store
 */

import type { EvidenceDocument } from "./summarizer/types";
import { DocumentNotFoundError } from "./summarizer/errors";

export interface DocumentInput {
  id: string | number;
  text: string;
}

export interface BulkLookup {
  documents: Map<string, EvidenceDocument>;
  /** Requested ids the store does not hold, in request order */
  missingIds: string[];
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

function toDocument(input: DocumentInput): EvidenceDocument {
  return Object.freeze({
    id: String(input.id),
    text: input.text,
    wordCount: countWords(input.text),
  });
}

export class DocumentStore {
  private snapshotMap: ReadonlyMap<string, EvidenceDocument>;
  private writeChain: Promise<unknown> = Promise.resolve();

  constructor(documents: Iterable<DocumentInput> = []) {
    const map = new Map<string, EvidenceDocument>();
    for (const doc of documents) {
      const built = toDocument(doc);
      map.set(built.id, built);
    }
    this.snapshotMap = map;
  }

  /** Build from the `{ "<docId>": text }` shape of an input record. */
  static fromRecord(docs: Record<string, string>): DocumentStore {
    return new DocumentStore(Object.entries(docs).map(([id, text]) => ({ id, text })));
  }

  get size(): number {
    return this.snapshotMap.size;
  }

  has(id: string): boolean {
    return this.snapshotMap.has(id);
  }

  /** All document ids in insertion order. */
  ids(): string[] {
    return Array.from(this.snapshotMap.keys());
  }

  /** Current read-only view. Later ingests do not affect it. */
  snapshot(): ReadonlyMap<string, EvidenceDocument> {
    return this.snapshotMap;
  }

  get(id: string): EvidenceDocument {
    const doc = this.snapshotMap.get(id);
    if (!doc) throw new DocumentNotFoundError(id);
    return doc;
  }

  /**
   * Bulk lookup. Unknown ids are omitted from `documents` and listed in
   * `missingIds` for the caller to log.
   */
  getMany(ids: Iterable<string>): BulkLookup {
    const view = this.snapshotMap;
    const documents = new Map<string, EvidenceDocument>();
    const missingIds: string[] = [];
    for (const id of ids) {
      const doc = view.get(id);
      if (doc) {
        documents.set(id, doc);
      } else if (!missingIds.includes(id)) {
        missingIds.push(id);
      }
    }
    return { documents, missingIds };
  }

  /**
   * Add or replace documents. Writes run one at a time; readers keep the
   * previous snapshot until the write finishes.
   *
   * @returns number of documents written
   */
  ingest(documents: Iterable<DocumentInput>): Promise<number> {
    const batch = Array.from(documents, toDocument);
    const write = this.writeChain.then(() => {
      const next = new Map(this.snapshotMap);
      for (const doc of batch) next.set(doc.id, doc);
      this.snapshotMap = next;
      console.log(`[Document-Store] Ingested ${batch.length} documents (total ${next.size})`);
      return batch.length;
    });
    // Keep the chain alive after a failed write; the caller still sees the rejection.
    this.writeChain = write.catch((err: unknown) => {
      console.error("[Document-Store] Ingest failed:", err);
    });
    return write;
  }
}

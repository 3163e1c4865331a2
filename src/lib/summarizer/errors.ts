/**
 * Summarizer error taxonomy.
 *
 * Every failure is scoped to one query. Rejections from the grounding
 * validator are plain values (they drive regeneration); the classes below
 * are thrown.
 *
 * @module summarizer/errors
 */

import type { Polarity } from "./types";

export class SummarizerError extends Error {
  constructor(
    message: string,
    public readonly queryId?: string,
  ) {
    super(message);
    this.name = "SummarizerError";
  }
}

/** Single-document lookup miss. Callers may skip the document. */
export class DocumentNotFoundError extends SummarizerError {
  constructor(public readonly docId: string) {
    super(`Document not found: ${docId}`);
    this.name = "DocumentNotFoundError";
  }
}

/** A stance pool came out empty. Fatal for the query; no partial result. */
export class InsufficientEvidenceError extends SummarizerError {
  constructor(
    public readonly polarity: Polarity,
    queryId?: string,
    public readonly retrievedCount: number = 0,
  ) {
    super(
      `No ${polarity} evidence for query ${queryId ?? "(unknown)"} (${retrievedCount} retrieved documents)`,
      queryId,
    );
    this.name = "InsufficientEvidenceError";
  }
}

// ============================================================================
// REJECTIONS
// ============================================================================

export type RejectionReason =
  | {
      kind: "malformed-claim-count";
      polarity: Polarity | null;
      message: string;
    }
  | {
      kind: "ungrounded-perspective";
      polarity: Polarity;
      perspectiveIndex: number;
      /** Cited ids outside the retrieved set (empty when nothing was cited) */
      invalidDocIds: string[];
      message: string;
    }
  | {
      kind: "cross-grounded-perspective";
      polarity: Polarity;
      perspectiveIndex: number;
      /** Cited ids that belong to the opposing pool or claim */
      invalidDocIds: string[];
      message: string;
    }
  | {
      kind: "duplicate-perspective";
      polarity: Polarity;
      perspectiveIndex: number;
      duplicateOfIndex: number;
      similarity: number;
      message: string;
    };

export type RejectionKind = RejectionReason["kind"];

/** Regeneration budget used up for one polarity branch. */
export class SynthesisExhaustedError extends SummarizerError {
  constructor(
    public readonly polarity: Polarity,
    public readonly attempts: number,
    public readonly lastRejection: RejectionReason | null,
    public readonly clusterDocIds: string[][] = [],
    queryId?: string,
  ) {
    const detail = lastRejection ? `: ${lastRejection.kind} (${lastRejection.message})` : "";
    super(
      `Synthesis exhausted for ${polarity} claim after ${attempts} attempts${detail}`,
      queryId,
    );
    this.name = "SynthesisExhaustedError";
  }
}

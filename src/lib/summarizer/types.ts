/**
 * Summarizer Types
 *
 * Data model for the grounded multi-perspective summarizer.
 * Queries and documents come from outside and are read-only; claims,
 * perspectives and results are built per invocation and frozen once built.
 *
 * @module summarizer/types
 */

// ============================================================================
// INPUTS
// ============================================================================

export type Polarity = "pro" | "con";

export const POLARITIES: readonly Polarity[] = ["pro", "con"] as const;

/**
 * A contested query. Identity is by `id`: two queries may share the same
 * text and must still be processed independently.
 */
export interface Query {
  readonly id: string;
  readonly text: string;
}

/** An evidence document owned by the DocumentStore. */
export interface EvidenceDocument {
  readonly id: string;
  readonly text: string;
  readonly wordCount: number;
}

// ============================================================================
// OUTPUTS
// ============================================================================

export interface Perspective {
  /** One-sentence perspective (target ~12 words) */
  readonly text: string;
  /** Non-empty, duplicate-free, subset of the query's retrieved documents */
  readonly supportingDocIds: readonly string[];
}

export interface Claim {
  /** Short claim sentence (target ~5 words) */
  readonly text: string;
  readonly polarity: Polarity;
  readonly perspectives: readonly Perspective[];
}

/**
 * Final record for one query. Exactly two claims by construction:
 * one field per polarity rather than a list.
 */
export interface SummaryResult {
  readonly queryId: string;
  readonly claimPro: Claim;
  readonly claimCon: Claim;
}

/** Disjoint split of retrieved documents by stance. */
export interface StancePools {
  readonly pro: readonly string[];
  readonly con: readonly string[];
  /** Neutral, unassigned or conflicting documents */
  readonly excluded: readonly string[];
}

// ============================================================================
// WIRE FORMAT
// ============================================================================

export interface OutputPerspective {
  text: string;
  doc_ids: string[];
}

export interface OutputClaim {
  text: string;
  perspectives: OutputPerspective[];
}

export interface OutputRecord {
  claim_pro: OutputClaim;
  claim_con: OutputClaim;
}

/**
 * Grounding Validation
 *
 * Referential-integrity check of a finished result against the ids that
 * were retrieved for its query. Runs after generation; a failed check
 * returns a typed rejection that drives targeted regeneration.
 *
 * Checks, in order:
 * (a) claim shape: pro/con polarity per field, at least one perspective each
 * (b) every perspective cites at least one document
 * (c) every cited id was retrieved for the query
 * (c') a claim cites only its own stance pool, and no document supports
 *      both claims (when pool separation is enforced)
 * (d) no two perspectives of a claim are near-duplicates
 * (e) word counts over the soft bounds only add warnings
 *
 * @module summarizer/grounding-validator
 */

import { DEFAULT_SUMMARIZER_CONFIG, type SummarizerConfig } from "../config-schemas";
import { countWords } from "../document-store";
import type { RejectionReason } from "./errors";
import { findNearDuplicatePairs, type SimilarityScorer } from "./text-similarity";
import type { Claim, Polarity, StancePools, SummaryResult } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export type ValidationOutcome =
  | { ok: true; result: SummaryResult; warnings: string[] }
  | { ok: false; rejection: RejectionReason; warnings: string[] };

export type ClaimValidationOutcome =
  | { ok: true; claim: Claim; warnings: string[] }
  | { ok: false; rejection: RejectionReason; warnings: string[] };

export type GroundingPools = Pick<StancePools, "pro" | "con">;

// ============================================================================
// VALIDATOR
// ============================================================================

export class GroundingValidator {
  constructor(
    private readonly scorer: SimilarityScorer,
    private readonly config: SummarizerConfig = DEFAULT_SUMMARIZER_CONFIG,
  ) {}

  async validate(
    result: SummaryResult,
    retrievedDocIds: readonly string[],
    pools?: GroundingPools,
  ): Promise<ValidationOutcome> {
    const warnings: string[] = [];

    const shape = checkClaimShape(result);
    if (shape) return { ok: false, rejection: shape, warnings };

    const claims: Claim[] = [result.claimPro, result.claimCon];
    const retrieved = new Set(retrievedDocIds);

    for (const claim of claims) {
      const rejection = this.checkGrounding(claim, retrieved, pools?.[claim.polarity]);
      if (rejection) return { ok: false, rejection, warnings };
    }

    if (this.config.grounding.enforcePoolSeparation) {
      const shared = checkSharedSupport(result.claimPro, result.claimCon);
      if (shared) return { ok: false, rejection: shared, warnings };
    }

    for (const claim of claims) {
      const rejection = await this.checkDuplicates(claim);
      if (rejection) return { ok: false, rejection, warnings };
    }

    for (const claim of claims) warnings.push(...this.lengthWarnings(claim));
    for (const w of warnings) console.warn(`[Grounding] Query ${result.queryId}: ${w}`);

    return { ok: true, result, warnings };
  }

  /**
   * Checks (b) to (e) for one branch. Used while regenerating a single
   * claim, before the full result exists.
   */
  async validateClaim(
    claim: Claim,
    retrievedDocIds: readonly string[],
    pool?: readonly string[],
  ): Promise<ClaimValidationOutcome> {
    const warnings: string[] = [];

    if (claim.perspectives.length === 0) {
      return {
        ok: false,
        rejection: {
          kind: "malformed-claim-count",
          polarity: claim.polarity,
          message: `The ${claim.polarity} claim has no perspectives`,
        },
        warnings,
      };
    }

    const grounding = this.checkGrounding(claim, new Set(retrievedDocIds), pool);
    if (grounding) return { ok: false, rejection: grounding, warnings };

    const duplicate = await this.checkDuplicates(claim);
    if (duplicate) return { ok: false, rejection: duplicate, warnings };

    warnings.push(...this.lengthWarnings(claim));
    return { ok: true, claim, warnings };
  }

  private checkGrounding(
    claim: Claim,
    retrieved: ReadonlySet<string>,
    pool?: readonly string[],
  ): RejectionReason | null {
    const ownPool = pool && this.config.grounding.enforcePoolSeparation ? new Set(pool) : null;

    for (const [index, perspective] of claim.perspectives.entries()) {
      if (perspective.supportingDocIds.length === 0) {
        return {
          kind: "ungrounded-perspective",
          polarity: claim.polarity,
          perspectiveIndex: index,
          invalidDocIds: [],
          message: `Perspective ${index} of the ${claim.polarity} claim cites no documents`,
        };
      }

      const notRetrieved = perspective.supportingDocIds.filter((id) => !retrieved.has(id));
      if (notRetrieved.length > 0) {
        return {
          kind: "ungrounded-perspective",
          polarity: claim.polarity,
          perspectiveIndex: index,
          invalidDocIds: notRetrieved,
          message: `Perspective ${index} of the ${claim.polarity} claim cites documents not retrieved for the query: ${notRetrieved.join(", ")}`,
        };
      }

      if (ownPool) {
        const foreign = perspective.supportingDocIds.filter((id) => !ownPool.has(id));
        if (foreign.length > 0) {
          return {
            kind: "cross-grounded-perspective",
            polarity: claim.polarity,
            perspectiveIndex: index,
            invalidDocIds: foreign,
            message: `Perspective ${index} of the ${claim.polarity} claim cites documents outside its stance pool: ${foreign.join(", ")}`,
          };
        }
      }
    }
    return null;
  }

  private async checkDuplicates(claim: Claim): Promise<RejectionReason | null> {
    const threshold = this.config.similarity.nearDuplicateThreshold;
    const pairs = await findNearDuplicatePairs(
      claim.perspectives.map((p) => p.text),
      this.scorer,
      threshold,
    );
    if (pairs.length === 0) return null;

    const { first, second, similarity } = pairs[0];
    return {
      kind: "duplicate-perspective",
      polarity: claim.polarity,
      perspectiveIndex: second,
      duplicateOfIndex: first,
      similarity,
      message: `Perspectives ${first} and ${second} of the ${claim.polarity} claim overlap (similarity ${similarity.toFixed(2)} >= ${threshold})`,
    };
  }

  private lengthWarnings(claim: Claim): string[] {
    const { maxPerspectiveWords, maxClaimWords } = this.config.grounding;
    const warnings: string[] = [];

    const claimWords = countWords(claim.text);
    if (claimWords > maxClaimWords) {
      warnings.push(`${claim.polarity} claim has ${claimWords} words (soft limit ${maxClaimWords})`);
    }
    claim.perspectives.forEach((p, i) => {
      const words = countWords(p.text);
      if (words > maxPerspectiveWords) {
        warnings.push(`${claim.polarity} perspective ${i} has ${words} words (soft limit ${maxPerspectiveWords})`);
      }
    });
    return warnings;
  }
}

// ============================================================================
// STRUCTURAL CHECKS
// ============================================================================

function checkClaimShape(result: SummaryResult): RejectionReason | null {
  const expected: Array<[Claim, Polarity]> = [
    [result.claimPro, "pro"],
    [result.claimCon, "con"],
  ];

  for (const [claim, polarity] of expected) {
    if (claim.polarity !== polarity) {
      return {
        kind: "malformed-claim-count",
        polarity: null,
        message: `Expected one pro and one con claim; the ${polarity} field holds a ${claim.polarity} claim`,
      };
    }
    if (claim.perspectives.length === 0) {
      return {
        kind: "malformed-claim-count",
        polarity,
        message: `The ${polarity} claim has no perspectives`,
      };
    }
  }
  return null;
}

/** First con perspective citing a document that already supports the pro claim. */
function checkSharedSupport(pro: Claim, con: Claim): RejectionReason | null {
  const proIds = new Set(pro.perspectives.flatMap((p) => p.supportingDocIds));

  for (const [index, perspective] of con.perspectives.entries()) {
    const shared = perspective.supportingDocIds.filter((id) => proIds.has(id));
    if (shared.length > 0) {
      return {
        kind: "cross-grounded-perspective",
        polarity: "con",
        perspectiveIndex: index,
        invalidDocIds: shared,
        message: `Perspective ${index} of the con claim cites documents that also support the pro claim: ${shared.join(", ")}`,
      };
    }
  }
  return null;
}

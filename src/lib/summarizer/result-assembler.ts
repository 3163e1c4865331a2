/**
 * Result assembly: packs two validated claims into the final record.
 * Pure; performs no validation.
 *
 * @module summarizer/result-assembler
 */

import type { Claim, OutputClaim, OutputRecord, Perspective, Query, SummaryResult } from "./types";

function freezePerspective(p: Perspective): Perspective {
  return Object.freeze({ text: p.text, supportingDocIds: Object.freeze([...p.supportingDocIds]) });
}

function freezeClaim(claim: Claim): Claim {
  return Object.freeze({
    text: claim.text,
    polarity: claim.polarity,
    perspectives: Object.freeze(claim.perspectives.map(freezePerspective)),
  });
}

export function assembleResult(query: Query, claimPro: Claim, claimCon: Claim): SummaryResult {
  return Object.freeze({
    queryId: query.id,
    claimPro: freezeClaim(claimPro),
    claimCon: freezeClaim(claimCon),
  });
}

function toOutputClaim(claim: Claim): OutputClaim {
  return {
    text: claim.text,
    perspectives: claim.perspectives.map((p) => ({ text: p.text, doc_ids: [...p.supportingDocIds] })),
  };
}

/** Wire shape: `{ claim_pro, claim_con }` with snake_case perspective ids. */
export function toOutputRecord(result: SummaryResult): OutputRecord {
  return {
    claim_pro: toOutputClaim(result.claimPro),
    claim_con: toOutputClaim(result.claimCon),
  };
}

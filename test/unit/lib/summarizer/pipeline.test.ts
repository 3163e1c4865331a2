/**
 * Tests for the summarizer pipeline end to end against a scripted generator.
 *
 * Validates pool separation, insufficient evidence, candidate restriction,
 * batch concurrency and the regeneration loop.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { DocumentStore } from "@/lib/document-store";
import { parseInputRecords } from "@/lib/input-record";
import { resetAllCircuits } from "@/lib/provider-circuit-breaker";
import { TfidfRetriever } from "@/lib/retrieval";
import { InsufficientEvidenceError, SynthesisExhaustedError, type RejectionReason } from "@/lib/summarizer/errors";
import {
  GroundingValidator,
  type ClaimValidationOutcome,
  type ValidationOutcome,
} from "@/lib/summarizer/grounding-validator";
import { PerspectiveSynthesizer } from "@/lib/summarizer/perspective-synthesizer";
import { Summarizer, summarizeQuery, type SummarizerDependencies } from "@/lib/summarizer/pipeline";
import { toOutputRecord } from "@/lib/summarizer/result-assembler";
import { LabeledStancePartitioner } from "@/lib/summarizer/stance-partition";
import { LexicalSimilarityScorer } from "@/lib/summarizer/text-similarity";
import type { Claim, SummaryResult } from "@/lib/summarizer/types";
import { FakeTextGenerator, scriptedGenerator, testConfig } from "@test/helpers/test-helpers";

const memes = { id: "q1", text: "Are surrealist memes art?" };

const store = new DocumentStore([
  { id: "205", text: "Surrealist memes extend the collage tradition of art." },
  { id: "364", text: "Dream logic in memes mirrors surrealist automatic writing." },
  { id: "1138", text: "Memes are disposable jokes, not crafted art." },
  { id: "858", text: "Art requires intent that viral meme templates lack." },
]);

const stances = { "205": "pro", "364": "pro", "1138": "con", "858": "con" } as const;

const citedIds = (claim: Claim) => claim.perspectives.flatMap((p) => p.supportingDocIds).sort();

beforeEach(() => {
  resetAllCircuits();
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("Summarizer", () => {
  it("produces one grounded claim per side from disjoint pools", async () => {
    const generator = scriptedGenerator({
      stances,
      claims: { pro: "Memes continue surrealist art.", con: "Memes are throwaway jokes." },
    });
    const summarizer = Summarizer.create({ store, config: testConfig(), generator });

    const result = await summarizer.summarizeQuery(memes);

    expect(result.queryId).toBe("q1");
    expect(result.claimPro.text).toBe("Memes continue surrealist art.");
    expect(result.claimCon.text).toBe("Memes are throwaway jokes.");
    expect(citedIds(result.claimPro)).toEqual(["205", "364"]);
    expect(citedIds(result.claimCon)).toEqual(["1138", "858"]);
    expect(result.claimPro.perspectives).toHaveLength(2);
    expect(result.claimCon.perspectives).toHaveLength(2);

    const record = toOutputRecord(result);
    expect(Object.keys(record)).toEqual(["claim_pro", "claim_con"]);
    expect(record.claim_pro.perspectives.flatMap((p) => p.doc_ids).sort()).toEqual(["205", "364"]);

    expect(generator.callsFor("partition")).toHaveLength(1);
    expect(generator.callsFor("perspective")).toHaveLength(4);
    expect(generator.callsFor("claim")).toHaveLength(2);
    await summarizer.close();
  });

  it("fails the query when one side has no evidence", async () => {
    const generator = scriptedGenerator({ stances: { "205": "pro", "364": "pro", "1138": "neutral" } });
    const summarizer = Summarizer.create({ store, config: testConfig(), generator });

    const attempt = summarizer.summarizeQuery(memes);

    await expect(attempt).rejects.toBeInstanceOf(InsufficientEvidenceError);
    await expect(attempt).rejects.toMatchObject({ polarity: "con", queryId: "q1", retrievedCount: 4 });
    expect(generator.callsFor("perspective")).toHaveLength(0);
  });

  it("treats queries with identical text as separate queries", async () => {
    const generator = scriptedGenerator({ stances });
    const summarizer = Summarizer.create({ store, config: testConfig(), generator });

    const [first, second] = await Promise.all([
      summarizer.summarizeQuery({ id: "q1", text: memes.text }),
      summarizer.summarizeQuery({ id: "q2", text: memes.text }),
    ]);

    expect(first.queryId).toBe("q1");
    expect(second.queryId).toBe("q2");
    expect(generator.callsFor("partition")).toHaveLength(2);
  });

  it("partitions from stance labels without a model call", async () => {
    const generator = scriptedGenerator({});
    const summarizer = Summarizer.create({
      store,
      config: testConfig(),
      generator,
      stanceLabels: new Map([["q1", { favorIds: ["205"], againstIds: ["858"] }]]),
    });

    const result = await summarizer.summarizeQuery(memes);

    expect(generator.callsFor("partition")).toHaveLength(0);
    expect(result.claimPro.perspectives).toEqual([{ text: "Perspective drawn from 205.", supportingDocIds: ["205"] }]);
    expect(result.claimCon.perspectives).toEqual([{ text: "Perspective drawn from 858.", supportingDocIds: ["858"] }]);
  });

  it("retrieves only among the supplied candidates", async () => {
    const generator = scriptedGenerator({ stances });
    const summarizer = Summarizer.create({ store, config: testConfig(), generator });

    const result = await summarizer.summarizeQuery(memes, { candidateIds: ["205", "1138"] });

    expect(citedIds(result.claimPro)).toEqual(["205"]);
    expect(citedIds(result.claimCon)).toEqual(["1138"]);
  });
});

describe("Summarizer.summarizeBatch", () => {
  const docs = Object.fromEntries(store.ids().map((id) => [id, store.get(id).text]));
  const inputs = parseInputRecords(
    ["q1", "q2", "q3"].map((id) => ({ id, query: memes.text, docs })),
  );

  /** Highest number of partition calls in flight at once during one batch. */
  async function peakPartitions(maxConcurrency: number, override?: number): Promise<number> {
    let active = 0;
    let peak = 0;
    const scripted = scriptedGenerator({ stances });
    const generator = new FakeTextGenerator(async (prompt, options) => {
      if (options.task === "partition") {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 25));
        active--;
      }
      return scripted.generate(prompt, options);
    });
    const summarizer = Summarizer.create({ store, config: testConfig({ batch: { maxConcurrency } }), generator });

    const outcomes = await summarizer.summarizeBatch(inputs, override === undefined ? {} : { maxConcurrency: override });

    expect(outcomes.map((o) => [o.queryId, o.status])).toEqual([
      ["q1", "ok"],
      ["q2", "ok"],
      ["q3", "ok"],
    ]);
    return peak;
  }

  it("limits concurrency to the configured batch.maxConcurrency", async () => {
    expect(await peakPartitions(1)).toBe(1);
    expect(await peakPartitions(3)).toBe(3);
  });

  it("lets the caller override the configured limit", async () => {
    expect(await peakPartitions(3, 1)).toBe(1);
  });
});

describe("summarizeQuery regeneration", () => {
  const config = testConfig();

  function buildDeps(validator: GroundingValidator) {
    const synthesizer = new PerspectiveSynthesizer(scriptedGenerator({}), new LexicalSimilarityScorer(), config);
    const deps: SummarizerDependencies = {
      config,
      store,
      retriever: new TfidfRetriever(store),
      partitioner: new LabeledStancePartitioner({ q1: { favorIds: ["205", "364"], againstIds: ["1138", "858"] } }),
      synthesizer,
      validator,
    };
    return { deps, regenerate: vi.spyOn(synthesizer, "regenerate") };
  }

  /** Rejects the first scripted validations of each kind, then defers to the real checks. */
  class ScriptedValidator extends GroundingValidator {
    calls = 0;
    claimCalls: Array<Claim["polarity"]> = [];

    constructor(
      private readonly rejections: RejectionReason[],
      private readonly claimRejections: RejectionReason[] = [],
    ) {
      super(new LexicalSimilarityScorer(), config);
    }

    override async validateClaim(
      claim: Claim,
      retrievedDocIds: readonly string[],
      pool?: readonly string[],
    ): Promise<ClaimValidationOutcome> {
      const rejection = this.claimRejections[this.claimCalls.length];
      this.claimCalls.push(claim.polarity);
      if (rejection) return { ok: false, rejection, warnings: [] };
      return super.validateClaim(claim, retrievedDocIds, pool);
    }

    override async validate(
      result: SummaryResult,
      retrievedDocIds: readonly string[],
      pools?: { pro: readonly string[]; con: readonly string[] },
    ): Promise<ValidationOutcome> {
      const rejection = this.rejections[this.calls++];
      if (rejection) return { ok: false, rejection, warnings: [] };
      return super.validate(result, retrievedDocIds, pools);
    }
  }

  const ungroundedPro: RejectionReason = {
    kind: "ungrounded-perspective",
    polarity: "pro",
    perspectiveIndex: 0,
    invalidDocIds: ["999"],
    message: "Perspective 0 of the pro claim cites documents not retrieved for the query: 999",
  };

  it("regenerates only the rejected side", async () => {
    const validator = new ScriptedValidator([ungroundedPro]);
    const { deps, regenerate } = buildDeps(validator);

    const result = await summarizeQuery(deps, memes);

    expect(validator.calls).toBe(2);
    expect(regenerate).toHaveBeenCalledTimes(1);
    expect(regenerate.mock.calls[0][0].polarity).toBe("pro");
    expect(validator.claimCalls).toEqual(["pro"]);
    expect(citedIds(result.claimPro)).toEqual(["205", "364"]);
  });

  it("regenerates both sides for a shape rejection", async () => {
    const validator = new ScriptedValidator([
      { kind: "malformed-claim-count", polarity: null, message: "Expected one pro and one con claim" },
    ]);
    const { deps, regenerate } = buildDeps(validator);

    await summarizeQuery(deps, memes);

    expect(regenerate.mock.calls.map((call) => call[0].polarity).sort()).toEqual(["con", "pro"]);
  });

  it("checks a repaired claim on its own before re-validating the result", async () => {
    const duplicatePro: RejectionReason = {
      kind: "duplicate-perspective",
      polarity: "pro",
      perspectiveIndex: 1,
      duplicateOfIndex: 0,
      similarity: 0.8,
      message: "Perspectives 0 and 1 of the pro claim overlap (similarity 0.80 >= 0.6)",
    };
    const validator = new ScriptedValidator([ungroundedPro], [duplicatePro]);
    const { deps, regenerate } = buildDeps(validator);

    await summarizeQuery(deps, memes);

    expect(regenerate).toHaveBeenCalledTimes(2);
    expect(regenerate.mock.calls[1][1]).toBe(duplicatePro);
    expect(validator.claimCalls).toEqual(["pro", "pro"]);
    expect(validator.calls).toBe(2);
  });

  it("gives up after the attempt budget", async () => {
    const crossCon: RejectionReason = {
      kind: "cross-grounded-perspective",
      polarity: "con",
      perspectiveIndex: 0,
      invalidDocIds: ["205"],
      message: "Perspective 0 of the con claim cites documents outside its stance pool: 205",
    };
    const validator = new ScriptedValidator([crossCon, crossCon, crossCon]);
    const { deps, regenerate } = buildDeps(validator);

    const attempt = summarizeQuery(deps, memes);

    await expect(attempt).rejects.toBeInstanceOf(SynthesisExhaustedError);
    await expect(attempt).rejects.toMatchObject({ polarity: "con", attempts: 3, lastRejection: crossCon });
    expect(validator.calls).toBe(3);
    expect(regenerate).toHaveBeenCalledTimes(2);
  });
});
